import net from 'net';
import { IPeerInfo } from './Types/PeerTypes.js';
import { ITrackerReply } from './Types/ServerTypes.js';
import { describeError, TrackerRequestError } from './utils/errors.js';
import { validateTrackerReply } from './utils/validation.js';

export interface ITrackerClientOptions {
    host: string;
    port: number;
    timeoutMs?: number;
}

/**
 * What the chat client needs from the tracker.
 */
export interface ITrackerClient {
    readonly address: string;
    register(peerId: string, ip: string, port: number): Promise<number>;
    unregister(peerId: string): Promise<void>;
    heartbeat(peerId: string): Promise<void>;
    getPeers(): Promise<IPeerInfo[]>;
}

/**
 * Talks to the tracker's control port: one connection, one command, one JSON reply.
 */
export class TrackerClient implements ITrackerClient {
    private host: string;
    private port: number;
    private timeoutMs: number;

    constructor(options: ITrackerClientOptions) {
        this.host = options.host;
        this.port = options.port;
        this.timeoutMs = options.timeoutMs ?? 10000;
    }

    public get address(): string {
        return `${this.host}:${this.port}`;
    }

    /** Resolves with the peer count the tracker reports. */
    public async register(peerId: string, ip: string, port: number): Promise<number> {
        const reply = await this.expectSuccess(`REGISTER ${peerId} ${ip} ${port}`);
        return reply.peer_count ?? 0;
    }

    public async unregister(peerId: string): Promise<void> {
        await this.expectSuccess(`UNREGISTER ${peerId}`);
    }

    public async heartbeat(peerId: string): Promise<void> {
        await this.expectSuccess(`HEARTBEAT ${peerId}`);
    }

    public async getPeers(): Promise<IPeerInfo[]> {
        const reply = await this.expectSuccess('GET_PEERS');
        return (reply.peers ?? []).map(peer => ({ peerId: peer.peer_id, address: peer.ip, port: peer.port }));
    }

    private async expectSuccess(command: string): Promise<ITrackerReply> {
        const reply = await this.send(command);
        if (reply.status !== 'success') {
            throw new TrackerRequestError(command, reply.message ?? 'Tracker returned an error');
        }
        return reply;
    }

    /**
     * Sends one command and reads until the tracker closes the connection.
     */
    public send(command: string): Promise<ITrackerReply> {
        return new Promise((resolve, reject) => {
            let response = '';
            let settled = false;

            const fail = (message: string) => {
                if (settled) return;
                settled = true;
                socket.destroy();
                reject(new TrackerRequestError(command, message));
            };

            const socket = net.createConnection({ host: this.host, port: this.port }, () => {
                socket.write(`${command}\n`);
            });
            socket.setEncoding('utf8');
            socket.setTimeout(this.timeoutMs);

            socket.on('data', (chunk: string) => {
                response += chunk;
            });

            socket.on('end', () => {
                if (settled) return;
                settled = true;
                socket.end();
                try {
                    resolve(parseReply(command, response));
                } catch (error) {
                    reject(error);
                }
            });

            socket.on('timeout', () => {
                fail(`Tracker at ${this.address} did not answer "${command}" within ${this.timeoutMs} ms`);
            });

            socket.on('error', (error) => {
                fail(`Could not reach tracker at ${this.address}: ${describeError(error)}`);
            });

            socket.on('close', () => {
                fail(`Tracker at ${this.address} closed the connection without replying`);
            });
        });
    }
}

function parseReply(command: string, raw: string): ITrackerReply {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new TrackerRequestError(command, `Unreadable tracker reply: ${describeError(error)}`);
    }
    const { error, value } = validateTrackerReply(parsed);
    if (error) {
        throw new TrackerRequestError(command, `Unexpected tracker reply: ${error.details[0].message}`);
    }
    return value;
}
