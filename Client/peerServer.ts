// Client/peerServer.ts
import net from 'net';
import { logger } from './utils/logger.js';

export type ConnectionHandler = (socket: net.Socket) => void;

/**
 * Accepts P2P connections other peers open to us and hands each socket on.
 */
export class PeerServer {
    private server: net.Server;

    constructor(onConnection: ConnectionHandler) {
        this.server = net.createServer((socket) => {
            logger.info(`[PeerServer] Incoming P2P connection from ${socket.remoteAddress}:${socket.remotePort}`);
            onConnection(socket);
        });
        this.server.on('error', (error) => {
            logger.error('[PeerServer] Listener error:', error);
        });
    }

    public listen(port: number, host: string = '0.0.0.0'): Promise<net.AddressInfo> {
        return new Promise((resolve, reject) => {
            const onError = (error: Error) => reject(error);
            this.server.once('error', onError);
            this.server.listen(port, host, () => {
                this.server.off('error', onError);
                const address = this.server.address();
                if (address && typeof address === 'object') {
                    logger.info(`📡 Peer server listening on port ${address.port}`);
                    resolve(address);
                } else {
                    reject(new Error(`Peer server bound to unexpected address: ${String(address)}`));
                }
            });
        });
    }

    public close(): Promise<void> {
        return new Promise((resolve) => {
            if (!this.server.listening) {
                resolve();
                return;
            }
            this.server.close(() => resolve());
        });
    }
}
