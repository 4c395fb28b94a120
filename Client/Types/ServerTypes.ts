export interface ITrackerPeerEntry {
    peer_id: string;
    ip: string;
    port: number;
}

export interface ITrackerReply {
    status: 'success' | 'error';
    message?: string;
    peer_count?: number;
    peers?: ITrackerPeerEntry[];
}
