import { IPeer } from '../types.js';
import { PeerNotFoundError } from '../utils/errors.js';
import { IPeerRegistry } from './IPeerRegistry.js';

export type Clock = () => number;

/**
 * In-memory peer table.
 *
 * Every method runs to completion without awaiting, so on the event loop each
 * call is one critical section and all calls observe a single total order.
 */
export class InMemoryPeerRegistry implements IPeerRegistry {
    private peers: Map<string, IPeer>;
    private now: Clock;

    constructor(now: Clock = Date.now) {
        this.peers = new Map();
        this.now = now;
    }

    async registerPeer(peerId: string, address: string, port: number): Promise<number> {
        const existing = this.peers.get(peerId);
        this.peers.set(peerId, { id: peerId, address, port, lastSeen: this.timestamp(existing?.lastSeen) });
        return this.peers.size;
    }

    async unregisterPeer(peerId: string): Promise<void> {
        if (!this.peers.delete(peerId)) {
            throw new PeerNotFoundError(peerId);
        }
    }

    async heartbeat(peerId: string): Promise<void> {
        const peer = this.peers.get(peerId);
        if (!peer) {
            throw new PeerNotFoundError(peerId);
        }
        peer.lastSeen = this.timestamp(peer.lastSeen);
    }

    async getPeer(peerId: string): Promise<IPeer | undefined> {
        const peer = this.peers.get(peerId);
        return peer ? copyPeer(peer) : undefined;
    }

    async getTotalPeers(): Promise<number> {
        return this.peers.size;
    }

    async listPeers(): Promise<IPeer[]> {
        return [...this.peers.values()].map(copyPeer);
    }

    async cleanupInactivePeers(timeoutMs: number): Promise<string[]> {
        const now = this.now();
        const removed: string[] = [];
        for (const [id, peer] of this.peers.entries()) {
            if (now - peer.lastSeen.getTime() > timeoutMs) {
                this.peers.delete(id);
                removed.push(id);
            }
        }
        return removed;
    }

    // last_seen never moves backwards, even if the wall clock does
    private timestamp(previous: Date | undefined): Date {
        const now = this.now();
        if (previous && previous.getTime() > now) {
            return new Date(previous.getTime());
        }
        return new Date(now);
    }
}

function copyPeer(peer: IPeer): IPeer {
    return { ...peer, lastSeen: new Date(peer.lastSeen.getTime()) };
}
