import net from 'net';
import http from 'http';
import { ITrackerConfig } from './config.js';
import { createMonitorApp } from './monitor.js';
import { handleCommandLine } from './protocol/dispatcher.js';
import { IPeerRegistry } from './services/IPeerRegistry.js';
import { TrackerReply } from './types.js';
import { logger } from './utils/logger.js';

const MAX_COMMAND_BYTES = 4096;
// A command without a trailing newline is taken as complete once the client
// has been quiet this long.
const COMMAND_SETTLE_MS = 50;

export class TrackerServer {
    private server: net.Server;
    private httpServer?: http.Server;
    private registry: IPeerRegistry;
    private config: ITrackerConfig;
    private connections: Set<net.Socket>;
    private cleanupTimer?: NodeJS.Timeout;

    constructor(config: ITrackerConfig, registry: IPeerRegistry) {
        this.config = config;
        this.registry = registry;
        this.connections = new Set();
        // Half-open so a client may shut down its write side and still read the reply.
        this.server = net.createServer({ allowHalfOpen: true }, (socket) => this.handleConnection(socket));
        this.server.on('error', (error) => {
            logger.error('Tracker socket error:', error);
        });
    }

    /**
     * Binds the control port (and the monitoring endpoint when configured),
     * starts the sweep loop, and resolves with the bound control address.
     */
    public async start(): Promise<net.AddressInfo> {
        const address = await listen(this.server, this.config.port, this.config.host);
        logger.info(`🚀 Tracker server listening on ${address.address}:${address.port}`);

        if (this.config.httpPort !== undefined) {
            const app = createMonitorApp(this.registry, this.config);
            this.httpServer = http.createServer(app);
            const httpAddress = await listen(this.httpServer, this.config.httpPort, this.config.host);
            logger.info(`📊 Monitoring endpoint on port ${httpAddress.port}`);
        }

        this.startCleanupJob();
        return address;
    }

    public get activeConnections(): number {
        return this.connections.size;
    }

    public monitorAddress(): net.AddressInfo | undefined {
        const address = this.httpServer?.address();
        return address && typeof address === 'object' ? address : undefined;
    }

    /**
     * One eviction pass. Returns the ids removed.
     */
    public async sweep(): Promise<string[]> {
        const removed = await this.registry.cleanupInactivePeers(this.config.peerTimeoutMs);
        for (const peerId of removed) {
            logger.info(`🧹 Removing inactive peer: ${peerId}`);
        }
        if (removed.length > 0) {
            logger.info(`Total active peers: ${await this.registry.getTotalPeers()}`);
        }
        return removed;
    }

    private startCleanupJob(): void {
        this.cleanupTimer = setInterval(() => {
            logger.debug('Running cleanup job for inactive peers...');
            this.sweep().catch((error) => {
                logger.error('Error during cleanup job:', error);
            });
        }, this.config.sweepIntervalMs);
    }

    private handleConnection(socket: net.Socket): void {
        const remote = `${socket.remoteAddress}:${socket.remotePort}`;
        logger.debug(`🔗 Connection from ${remote}`);
        this.connections.add(socket);

        let buffer = '';
        let handled = false;
        let settleTimer: NodeJS.Timeout | undefined;

        const finish = (line: string | undefined, reply?: TrackerReply) => {
            if (handled) return;
            handled = true;
            clearTimeout(settleTimer);
            socket.setTimeout(0);
            this.respond(socket, line, reply).catch((error) => {
                logger.error(`Error replying to ${remote}:`, error);
                socket.destroy();
            });
        };

        socket.setEncoding('utf8');
        socket.setTimeout(this.config.readTimeoutMs);

        socket.on('data', (chunk: string) => {
            if (handled) return;
            buffer += chunk;
            clearTimeout(settleTimer);

            const newline = buffer.indexOf('\n');
            if (newline !== -1) {
                finish(buffer.slice(0, newline).replace(/\r$/, ''));
            } else if (Buffer.byteLength(buffer) > MAX_COMMAND_BYTES) {
                finish(undefined, { status: 'error', message: 'Command too long' });
            } else {
                settleTimer = setTimeout(() => finish(buffer), COMMAND_SETTLE_MS);
            }
        });

        socket.on('end', () => {
            if (!handled && buffer.length > 0) {
                finish(buffer);
            } else if (!handled) {
                handled = true;
                socket.end(() => socket.destroy());
            }
        });

        socket.on('timeout', () => {
            logger.warn(`Connection from ${remote} timed out waiting for a command`);
            finish(undefined, { status: 'error', message: 'Request timed out' });
        });

        socket.on('error', (error) => {
            logger.warn(`Socket error from ${remote}: ${error.message}`);
        });

        socket.on('close', () => {
            clearTimeout(settleTimer);
            this.connections.delete(socket);
        });
    }

    private async respond(socket: net.Socket, line: string | undefined, reply?: TrackerReply): Promise<void> {
        let response: TrackerReply;
        if (reply) {
            response = reply;
        } else {
            logger.debug(`Received: ${(line ?? '').trim()}`);
            try {
                response = await handleCommandLine(line ?? '', this.registry);
            } catch (error) {
                logger.error('Error handling client command:', error);
                response = { status: 'error', message: 'Internal server error' };
            }
        }

        if (!socket.writable) {
            socket.destroy();
            return;
        }
        // One reply per connection; a client that keeps its side open is cut off.
        socket.end(JSON.stringify(response), () => socket.destroy());
    }

    public async stop(): Promise<void> {
        if (this.cleanupTimer) {
            clearInterval(this.cleanupTimer);
            this.cleanupTimer = undefined;
        }

        for (const socket of this.connections) {
            socket.destroy();
        }
        this.connections.clear();
        this.httpServer?.closeAllConnections();

        await Promise.all([
            close(this.server),
            this.httpServer ? close(this.httpServer) : Promise.resolve(),
        ]);
        this.httpServer = undefined;
        logger.info('Tracker server stopped.');
    }
}

function listen(server: net.Server, port: number, host: string): Promise<net.AddressInfo> {
    return new Promise((resolve, reject) => {
        const onError = (error: Error) => reject(error);
        server.once('error', onError);
        server.listen(port, host, () => {
            server.off('error', onError);
            const address = server.address();
            if (address && typeof address === 'object') {
                resolve(address);
            } else {
                reject(new Error(`Server bound to unexpected address: ${String(address)}`));
            }
        });
    });
}

function close(server: net.Server): Promise<void> {
    return new Promise((resolve) => {
        if (!server.listening) {
            resolve();
            return;
        }
        server.close((error) => {
            if (error) {
                logger.warn(`Error closing server: ${error.message}`);
            }
            resolve();
        });
    });
}
