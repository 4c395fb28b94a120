import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import { IPeerRegistry } from './services/IPeerRegistry.js';
import { ITrackerStats } from './types.js';
import { logger } from './utils/logger.js';

export interface IMonitorOptions {
    peerTimeoutMs: number;
    sweepIntervalMs: number;
}

/**
 * Read-only HTTP view of the registry for operators.
 */
export function createMonitorApp(registry: IPeerRegistry, options: IMonitorOptions): express.Application {
    const app = express();

    app.use(helmet());
    app.use(compression());
    app.use(cors());
    app.use(express.json());
    app.use(morgan('combined', {
        stream: { write: (message) => logger.info(message.trim()) }
    }));

    app.get('/health', (req, res) => {
        res.json({
            status: 'healthy',
            timestamp: new Date().toISOString(),
            uptime: process.uptime()
        });
    });

    app.get('/stats', async (req, res) => {
        try {
            const stats: ITrackerStats = {
                totalPeers: await registry.getTotalPeers(),
                peerTimeoutSeconds: options.peerTimeoutMs / 1000,
                sweepIntervalSeconds: options.sweepIntervalMs / 1000,
            };
            res.json(stats);
        } catch (error) {
            logger.error('Error getting stats:', error);
            res.status(500).json({ error: 'Failed to retrieve statistics' });
        }
    });

    app.get('/peers', async (req, res) => {
        try {
            const peers = (await registry.listPeers()).map(peer => ({
                peer_id: peer.id,
                ip: peer.address,
                port: peer.port,
                last_seen: peer.lastSeen.toISOString(),
            }));
            res.json({ peers, peer_count: peers.length });
        } catch (error) {
            logger.error('Error listing peers:', error);
            res.status(500).json({ error: 'Failed to retrieve peers' });
        }
    });

    return app;
}
