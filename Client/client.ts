import { EventEmitter } from 'events';
import { PeerConnectionManager } from './peerConnection.js';
import { PeerDirectory } from './peerDirectory.js';
import { PeerServer } from './peerServer.js';
import { ITrackerClient } from './trackerClient.js';
import { IChatMessage, IEnvelope, MessageType } from './Types/MessageTypes.js';
import { IPeerInfo } from './Types/PeerTypes.js';
import { ChatError, describeError, RegistrationFailedError } from './utils/errors.js';
import { logger } from './utils/logger.js';

export type ClientState = 'idle' | 'registering' | 'running' | 'stopping' | 'stopped';

export interface IChatClientOptions {
    peerId: string;
    listenPort: number;
    /** Address the inbound listener binds to. */
    listenHost?: string;
    /** Address other peers should dial, as registered with the tracker. */
    advertiseHost: string;
    heartbeatIntervalMs?: number;
    connectTimeoutMs?: number;
}

export type SendResult = { ok: true } | { ok: false; reason: string };

export interface IBroadcastResult {
    sentCount: number;
    failed: string[];
}

export interface IPeerStatus extends IPeerInfo {
    connected: boolean;
}

export interface ChatClient {
    on(event: 'message', listener: (message: IChatMessage) => void): this;
    on(event: 'state', listener: (state: ClientState) => void): this;
    emit(event: 'message', message: IChatMessage): boolean;
    emit(event: 'state', state: ClientState): boolean;
}

/**
 * One chat peer: registers with the tracker, keeps the registration alive,
 * discovers other peers and exchanges messages with them directly.
 */
export class ChatClient extends EventEmitter {
    readonly peerId: string;
    private options: IChatClientOptions;
    private tracker: ITrackerClient;
    private directory: PeerDirectory;
    private connections: PeerConnectionManager;
    private peerServer: PeerServer;
    private messages: IChatMessage[] = [];
    private heartbeatTimer?: NodeJS.Timeout;
    private currentState: ClientState = 'idle';

    constructor(options: IChatClientOptions, tracker: ITrackerClient, directory: PeerDirectory = new PeerDirectory()) {
        super();
        this.peerId = options.peerId;
        this.options = options;
        this.tracker = tracker;
        this.directory = directory;
        this.connections = new PeerConnectionManager(
            directory,
            (envelope) => this.receive(envelope),
            { connectTimeoutMs: options.connectTimeoutMs },
        );
        this.peerServer = new PeerServer((socket) => this.connections.handleInbound(socket));
    }

    public get state(): ClientState {
        return this.currentState;
    }

    /**
     * Registers with the tracker, opens the inbound listener, starts the
     * heartbeat and fetches the first peer list. Resolves with the network size
     * the tracker reported. Registration failure is fatal.
     */
    public async start(): Promise<number> {
        if (this.currentState !== 'idle') {
            throw new Error(`Cannot start a client that is ${this.currentState}`);
        }

        this.setState('registering');
        let peerCount: number;
        try {
            peerCount = await this.tracker.register(this.peerId, this.options.advertiseHost, this.options.listenPort);
        } catch (error) {
            this.setState('stopped');
            throw new RegistrationFailedError(`Failed to register with tracker: ${describeError(error)}`);
        }
        if (this.state !== 'registering') {
            await this.unregister();
            throw new RegistrationFailedError('Client was stopped while starting');
        }
        logger.info(`🔗 Registered with tracker ${this.tracker.address} (${peerCount} peers in network)`);

        try {
            await this.peerServer.listen(this.options.listenPort, this.options.listenHost);
        } catch (error) {
            await this.unregister();
            this.setState('stopped');
            throw new RegistrationFailedError(`Could not listen on port ${this.options.listenPort}: ${describeError(error)}`);
        }
        if (this.state !== 'registering') {
            await this.peerServer.close();
            await this.unregister();
            throw new RegistrationFailedError('Client was stopped while starting');
        }

        this.setState('running');
        this.startHeartbeat();

        try {
            await this.refreshPeers();
        } catch (error) {
            logger.warn(`Initial peer discovery failed: ${describeError(error)}`);
        }
        return peerCount;
    }

    /**
     * Pulls the tracker's peer list into the local cache, skipping ourselves.
     * Entries the tracker no longer reports are kept. Resolves with the cache size.
     */
    public async refreshPeers(): Promise<number> {
        const peers = await this.tracker.getPeers();
        this.directory.merge(peers, this.peerId);
        logger.info(`Updated peer list: ${this.directory.size} peers available`);
        return this.directory.size;
    }

    public async sendDirect(peerId: string, content: string): Promise<SendResult> {
        return this.deliver(peerId, this.envelope('direct', content));
    }

    /**
     * Sends to every cached peer. Individual failures lower the count; they never reject.
     */
    public async broadcast(content: string): Promise<IBroadcastResult> {
        const envelope = this.envelope('broadcast', content);
        const peers = this.directory.list();
        const results = await Promise.all(peers.map(peer => this.deliver(peer.peerId, envelope)));

        const failed = peers.filter((_, i) => !results[i].ok).map(peer => peer.peerId);
        const sentCount = peers.length - failed.length;
        logger.info(`Broadcast sent to ${sentCount} peers`);
        return { sentCount, failed };
    }

    /** Messages received so far, oldest first; the last `limit` when given. */
    public history(limit?: number): IChatMessage[] {
        const slice = limit === undefined ? this.messages : this.messages.slice(-limit);
        return slice.map(message => ({ ...message, time: new Date(message.time.getTime()) }));
    }

    public peers(): IPeerStatus[] {
        return this.directory.list().map(peer => ({
            ...peer,
            connected: this.connections.isConnected(peer.peerId),
        }));
    }

    /**
     * Leaves the network: unregisters (best effort), closes every peer
     * connection and the listener.
     */
    public async stop(): Promise<void> {
        if (this.currentState === 'stopping' || this.currentState === 'stopped') {
            return;
        }
        const wasRegistered = this.currentState === 'running';
        this.setState('stopping');

        if (this.heartbeatTimer) {
            clearInterval(this.heartbeatTimer);
            this.heartbeatTimer = undefined;
        }
        if (wasRegistered) {
            await this.unregister();
        }
        this.connections.closeAll();
        await this.peerServer.close();
        this.setState('stopped');
    }

    /**
     * Sends one HEARTBEAT. Failures are logged; the next tick tries again.
     */
    public async sendHeartbeat(): Promise<boolean> {
        try {
            await this.tracker.heartbeat(this.peerId);
            logger.debug('Heartbeat acknowledged');
            return true;
        } catch (error) {
            logger.warn(`Error sending heartbeat: ${describeError(error)}`);
            return false;
        }
    }

    private startHeartbeat(): void {
        const interval = this.options.heartbeatIntervalMs ?? 60000;
        this.heartbeatTimer = setInterval(() => {
            if (this.currentState !== 'running') return;
            void this.sendHeartbeat();
        }, interval);
    }

    private async unregister(): Promise<void> {
        try {
            await this.tracker.unregister(this.peerId);
            logger.info('Unregistered from tracker');
        } catch (error) {
            logger.warn(`Error unregistering: ${describeError(error)}`);
        }
    }

    private async deliver(peerId: string, envelope: IEnvelope): Promise<SendResult> {
        try {
            const connection = await this.connections.getOrConnect(peerId);
            await connection.send(envelope);
            logger.debug(`Sent ${envelope.type} message to ${peerId}`);
            return { ok: true };
        } catch (error) {
            if (!(error instanceof ChatError)) {
                throw error;
            }
            if (error.code === 'UNREACHABLE') {
                this.connections.drop(peerId);
            }
            logger.warn(error.message);
            return { ok: false, reason: error.message };
        }
    }

    private envelope(type: MessageType, content: string): IEnvelope {
        return { type, from: this.peerId, content };
    }

    private receive(envelope: IEnvelope): void {
        const message: IChatMessage = { ...envelope, time: new Date() };
        this.messages.push(message);
        this.emit('message', message);
    }

    private setState(state: ClientState): void {
        this.currentState = state;
        this.emit('state', state);
    }
}
