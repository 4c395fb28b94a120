#!/usr/bin/env node
import 'dotenv/config'; // Load .env before anything reads process.env

import { HelpRequested, ITrackerConfig, loadTrackerConfig, TRACKER_USAGE } from './config.js';
import { TrackerServer } from './server.js';
import { InMemoryPeerRegistry } from './services/PeerRegistry.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
    let config: ITrackerConfig;
    try {
        config = loadTrackerConfig();
    } catch (error) {
        if (error instanceof HelpRequested) {
            console.log(TRACKER_USAGE);
            process.exit(0);
        }
        console.error(error instanceof Error ? error.message : String(error));
        console.error(TRACKER_USAGE);
        process.exit(1);
    }

    const server = new TrackerServer(config, new InMemoryPeerRegistry());

    const shutdown = async () => {
        logger.info('Shutdown signal received, closing server...');
        await server.stop();
        process.exit(0);
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);

    try {
        await server.start();
    } catch (error) {
        logger.error('❌ Failed to start server:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    logger.error('Tracker crashed:', error);
    process.exit(1);
});
