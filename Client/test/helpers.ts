import net from 'net';
import { IPeerInfo } from '../Types/PeerTypes.js';
import { ITrackerClient } from '../trackerClient.js';

/** Asks the OS for a port nobody is listening on right now. */
export function getFreePort(): Promise<number> {
    return new Promise((resolve, reject) => {
        const probe = net.createServer();
        probe.once('error', reject);
        probe.listen(0, '127.0.0.1', () => {
            const address = probe.address();
            const port = typeof address === 'object' && address ? address.port : 0;
            probe.close(() => resolve(port));
        });
    });
}

/** In-process tracker stand-in that records what it was asked. */
export class FakeTracker implements ITrackerClient {
    readonly address = 'fake-tracker:5000';
    peers: IPeerInfo[] = [];
    calls: string[] = [];
    failRegister = false;
    failHeartbeats = 0;

    async register(peerId: string, ip: string, port: number): Promise<number> {
        this.calls.push(`REGISTER ${peerId} ${ip} ${port}`);
        if (this.failRegister) {
            throw new Error('connection refused');
        }
        return this.peers.length + 1;
    }

    async unregister(peerId: string): Promise<void> {
        this.calls.push(`UNREGISTER ${peerId}`);
    }

    async heartbeat(peerId: string): Promise<void> {
        this.calls.push(`HEARTBEAT ${peerId}`);
        if (this.failHeartbeats > 0) {
            this.failHeartbeats--;
            throw new Error('tracker down');
        }
    }

    async getPeers(): Promise<IPeerInfo[]> {
        this.calls.push('GET_PEERS');
        return this.peers.map(peer => ({ ...peer }));
    }
}

/** Resolves once `predicate` holds, polling on real timers. */
export async function eventually(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!predicate()) {
        if (Date.now() > deadline) {
            throw new Error('condition not met in time');
        }
        await new Promise((resolve) => setTimeout(resolve, 10));
    }
}
