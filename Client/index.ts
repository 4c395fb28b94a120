#!/usr/bin/env node
import 'dotenv/config'; // Load .env before anything reads process.env

import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { ChatCli, formatIncoming, HELP_TEXT } from './cli.js';
import { ChatClient } from './client.js';
import { CLIENT_USAGE, HelpRequested, IClientConfig, loadClientConfig } from './config.js';
import { TrackerClient } from './trackerClient.js';
import { describeError } from './utils/errors.js';

async function main() {
    let config: IClientConfig;
    try {
        config = loadClientConfig();
    } catch (error) {
        if (error instanceof HelpRequested) {
            console.log(CLIENT_USAGE);
            process.exit(0);
        }
        console.error(describeError(error));
        console.error(CLIENT_USAGE);
        process.exit(1);
    }

    console.log("=".repeat(60));
    console.log("P2P Chat Client");
    console.log("=".repeat(60));
    console.log(`Peer ID: ${config.peerId}`);
    console.log(`Listening on port: ${config.listenPort}`);
    console.log("=".repeat(60));

    const tracker = new TrackerClient({
        host: config.trackerHost,
        port: config.trackerPort,
        timeoutMs: config.requestTimeoutMs,
    });
    const client = new ChatClient({
        peerId: config.peerId,
        listenPort: config.listenPort,
        advertiseHost: config.advertiseHost,
        heartbeatIntervalMs: config.heartbeatIntervalMs,
    }, tracker);

    const peerCount = await client.start();
    console.log(`✅ Registered with tracker. Total peers in network: ${peerCount}`);
    console.log(`${client.peers().length} peers available`);

    const rl = readline.createInterface({ input, output });
    const cli = new ChatCli(client, (line) => console.log(line));

    client.on('message', (message) => {
        console.log(`\n${formatIncoming(message)}`);
        rl.prompt(true);
    });

    const shutdown = async () => {
        console.log("\nExiting...");
        await client.stop();
        rl.close();
        process.exit(0);
    };
    rl.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    console.log(`\n${HELP_TEXT}\n`);

    while (client.state === 'running') {
        const line = await rl.question("> ");
        if (!(await cli.execute(line))) {
            break;
        }
    }

    rl.close();
    process.exit(0);
}

main().catch(err => {
    console.error("❌", describeError(err));
    process.exit(1);
});
