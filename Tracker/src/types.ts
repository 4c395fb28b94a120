/**
 * A peer known to the tracker.
 * Owned by the PeerRegistry; callers only ever see copies.
 */
export interface IPeer {
  id: string;
  address: string;
  port: number;
  lastSeen: Date;
}

/**
 * Peer entry as it travels in a GET_PEERS reply.
 */
export interface IPeerEntry {
  peer_id: string;
  ip: string;
  port: number;
}

export interface ISuccessReply {
  status: 'success';
  message?: string;
  peer_count?: number;
  peers?: IPeerEntry[];
}

export interface IErrorReply {
  status: 'error';
  message: string;
}

export type TrackerReply = ISuccessReply | IErrorReply;

/**
 * Commands understood on the control port, one per connection.
 */
export type TrackerCommand =
  | { verb: 'REGISTER'; peerId: string; ip: string; port: number }
  | { verb: 'GET_PEERS' }
  | { verb: 'UNREGISTER'; peerId: string }
  | { verb: 'HEARTBEAT'; peerId: string };

/**
 * Served by the /stats monitoring route.
 */
export interface ITrackerStats {
  totalPeers: number;
  peerTimeoutSeconds: number;
  sweepIntervalSeconds: number;
}
