import net from 'net';
import { decodeEnvelope, encodeEnvelope, LineDecoder } from './messageCodec.js';
import { PeerDirectory } from './peerDirectory.js';
import { IEnvelope } from './Types/MessageTypes.js';
import {
    ConnectFailedError,
    DecodeError,
    describeError,
    PeerUnknownError,
    UnreachableError,
} from './utils/errors.js';
import { logger } from './utils/logger.js';

export type MessageHandler = (envelope: IEnvelope, remote: string) => void;

export interface IPeerConnectionManagerOptions {
    connectTimeoutMs?: number;
}

/**
 * A live outbound socket to one peer.
 */
export class PeerConnection {
    readonly peerId: string;
    private socket: net.Socket;

    constructor(peerId: string, socket: net.Socket) {
        this.peerId = peerId;
        this.socket = socket;
    }

    public get isOpen(): boolean {
        return !this.socket.destroyed && this.socket.writable;
    }

    public send(envelope: IEnvelope): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.isOpen) {
                reject(new UnreachableError(this.peerId, 'connection is closed'));
                return;
            }
            this.socket.write(encodeEnvelope(envelope), (error) => {
                if (error) {
                    reject(new UnreachableError(this.peerId, error.message));
                } else {
                    resolve();
                }
            });
        });
    }

    public close(): void {
        this.socket.destroy();
    }
}

/**
 * Outbound connections are dialed on first use and cached per peer id.
 * Inbound connections are read until they close and are never cached.
 */
export class PeerConnectionManager {
    private directory: PeerDirectory;
    private onMessage: MessageHandler;
    private connectTimeoutMs: number;
    private connections: Map<string, PeerConnection> = new Map();
    private pendingDials: Map<string, Promise<PeerConnection>> = new Map();
    private inbound: Set<net.Socket> = new Set();
    private closed = false;

    constructor(directory: PeerDirectory, onMessage: MessageHandler, options: IPeerConnectionManagerOptions = {}) {
        this.directory = directory;
        this.onMessage = onMessage;
        this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
    }

    /**
     * Returns the cached connection to `peerId`, dialing it first if needed.
     * Throws PeerUnknownError or ConnectFailedError.
     */
    public async getOrConnect(peerId: string): Promise<PeerConnection> {
        const cached = this.connections.get(peerId);
        if (cached?.isOpen) {
            return cached;
        }
        if (cached) {
            this.connections.delete(peerId);
        }

        const pending = this.pendingDials.get(peerId);
        if (pending) {
            return pending;
        }

        const peer = this.directory.get(peerId);
        if (!peer) {
            throw new PeerUnknownError(peerId);
        }

        const dial = this.dial(peerId, peer.address, peer.port).finally(() => {
            this.pendingDials.delete(peerId);
        });
        this.pendingDials.set(peerId, dial);
        return dial;
    }

    public isConnected(peerId: string): boolean {
        return this.connections.get(peerId)?.isOpen ?? false;
    }

    public get connectedPeers(): string[] {
        return [...this.connections.keys()].filter(peerId => this.isConnected(peerId));
    }

    /** Forgets and closes the cached connection to `peerId`, if any. */
    public drop(peerId: string): void {
        const connection = this.connections.get(peerId);
        if (connection) {
            this.connections.delete(peerId);
            connection.close();
        }
    }

    /**
     * Reads envelopes from a socket a peer opened to us until it closes.
     */
    public handleInbound(socket: net.Socket): void {
        if (this.closed) {
            socket.destroy();
            return;
        }
        const remote = `${socket.remoteAddress}:${socket.remotePort}`;
        this.inbound.add(socket);
        socket.on('close', () => {
            this.inbound.delete(socket);
        });
        this.readEnvelopes(socket, remote);
    }

    public get inboundCount(): number {
        return this.inbound.size;
    }

    /** Closes every connection. Dials still in flight are discarded when they land. */
    public closeAll(): void {
        this.closed = true;
        for (const connection of this.connections.values()) {
            connection.close();
        }
        this.connections.clear();
        for (const socket of this.inbound) {
            socket.destroy();
        }
        this.inbound.clear();
    }

    private dial(peerId: string, address: string, port: number): Promise<PeerConnection> {
        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ host: address, port });
            socket.setTimeout(this.connectTimeoutMs);

            const onConnectError = (error: Error) => {
                socket.destroy();
                reject(new ConnectFailedError(peerId, error.message));
            };
            const onConnectTimeout = () => {
                socket.destroy();
                reject(new ConnectFailedError(peerId, `no answer from ${address}:${port} within ${this.connectTimeoutMs} ms`));
            };
            socket.once('error', onConnectError);
            socket.once('timeout', onConnectTimeout);

            socket.once('connect', () => {
                socket.off('error', onConnectError);
                socket.off('timeout', onConnectTimeout);
                socket.setTimeout(0);
                if (this.closed) {
                    socket.destroy();
                    reject(new ConnectFailedError(peerId, 'connections were closed while dialing'));
                    return;
                }

                const connection = new PeerConnection(peerId, socket);
                this.connections.set(peerId, connection);
                logger.info(`Connected to peer: ${peerId} (${address}:${port})`);

                socket.on('close', () => {
                    if (this.connections.get(peerId) === connection) {
                        this.connections.delete(peerId);
                    }
                });
                this.readEnvelopes(socket, `${address}:${port}`);
                resolve(connection);
            });
        });
    }

    private readEnvelopes(socket: net.Socket, remote: string): void {
        const decoder = new LineDecoder();
        socket.setEncoding('utf8');

        socket.on('data', (chunk: string) => {
            let lines: string[];
            try {
                lines = decoder.push(chunk);
            } catch (error) {
                logger.warn(`Closing connection from ${remote}: ${describeError(error)}`);
                socket.destroy();
                return;
            }
            for (const line of lines) {
                this.deliver(line, remote);
            }
        });

        socket.on('end', () => {
            const rest = decoder.flush();
            if (rest) {
                this.deliver(rest, remote);
            }
            socket.end();
        });

        socket.on('error', (error) => {
            logger.warn(`Error on connection from ${remote}: ${error.message}`);
        });
    }

    private deliver(line: string, remote: string): void {
        let envelope: IEnvelope;
        try {
            envelope = decodeEnvelope(line);
        } catch (error) {
            if (error instanceof DecodeError) {
                logger.warn(`Dropping message from ${remote}: ${error.message}`);
                return;
            }
            throw error;
        }
        try {
            this.onMessage(envelope, remote);
        } catch (error) {
            logger.error(`Message handler failed for ${remote}:`, error);
        }
    }
}
