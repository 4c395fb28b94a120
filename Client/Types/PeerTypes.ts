/**
 * Local, possibly stale copy of a peer the tracker reported.
 */
export interface IPeerInfo {
    peerId: string;
    address: string;
    port: number;
}
