import { IPeerInfo } from './Types/PeerTypes.js';

/**
 * The client's peer-info cache. Entries are added or overwritten, never
 * removed by a refresh, so a peer the tracker has since evicted stays dialable.
 */
export class PeerDirectory {
    private peers: Map<string, IPeerInfo> = new Map();

    public upsert(peer: IPeerInfo): void {
        this.peers.set(peer.peerId, { ...peer });
    }

    /**
     * Merges a tracker listing, skipping `selfId`. Returns how many entries were written.
     */
    public merge(peers: IPeerInfo[], selfId: string): number {
        let written = 0;
        for (const peer of peers) {
            if (peer.peerId === selfId) continue;
            this.upsert(peer);
            written++;
        }
        return written;
    }

    public get(peerId: string): IPeerInfo | undefined {
        const peer = this.peers.get(peerId);
        return peer ? { ...peer } : undefined;
    }

    public has(peerId: string): boolean {
        return this.peers.has(peerId);
    }

    public list(): IPeerInfo[] {
        return [...this.peers.values()].map(peer => ({ ...peer }));
    }

    public get size(): number {
        return this.peers.size;
    }
}
