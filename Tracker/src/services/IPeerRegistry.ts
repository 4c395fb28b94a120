import { IPeer } from '../types.js';

/**
 * Defines the contract for the tracker's peer table.
 * The server receives an implementation at construction and never reaches
 * for ambient state.
 */
export interface IPeerRegistry {
    /** Inserts or overwrites the peer and returns the peer count afterwards. */
    registerPeer(peerId: string, address: string, port: number): Promise<number>;
    /** Throws PeerNotFoundError when the peer is absent. */
    unregisterPeer(peerId: string): Promise<void>;
    /** Throws PeerNotFoundError when the peer is absent. */
    heartbeat(peerId: string): Promise<void>;
    getPeer(peerId: string): Promise<IPeer | undefined>;
    getTotalPeers(): Promise<number>;
    /** Snapshot copy; mutating it does not touch the registry. */
    listPeers(): Promise<IPeer[]>;
    /** Removes every peer idle for longer than `timeoutMs` and returns the evicted ids. */
    cleanupInactivePeers(timeoutMs: number): Promise<string[]>;
}
