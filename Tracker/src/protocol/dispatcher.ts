import { IPeerRegistry } from '../services/IPeerRegistry.js';
import { TrackerCommand, TrackerReply } from '../types.js';
import { TrackerError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parseCommand } from './commandParser.js';

/**
 * Parses and executes one control line against the registry.
 * Tracker errors become `{status: 'error'}` replies; anything else propagates
 * to the connection handler.
 */
export async function handleCommandLine(line: string, registry: IPeerRegistry): Promise<TrackerReply> {
    try {
        return await executeCommand(parseCommand(line), registry);
    } catch (error) {
        if (error instanceof TrackerError) {
            logger.warn(`Rejected command "${line.trim()}": ${error.message}`);
            return { status: 'error', message: error.message };
        }
        throw error;
    }
}

export async function executeCommand(command: TrackerCommand, registry: IPeerRegistry): Promise<TrackerReply> {
    switch (command.verb) {
        case 'REGISTER': {
            const peerCount = await registry.registerPeer(command.peerId, command.ip, command.port);
            logger.info(`✅ Registered peer: ${command.peerId} (${command.ip}:${command.port})`);
            logger.info(`Total active peers: ${peerCount}`);
            return { status: 'success', message: 'Peer registered successfully', peer_count: peerCount };
        }
        case 'GET_PEERS': {
            const peers = (await registry.listPeers()).map(peer => ({
                peer_id: peer.id,
                ip: peer.address,
                port: peer.port,
            }));
            logger.info(`Sending peer list (${peers.length} peers)`);
            return { status: 'success', peers, peer_count: peers.length };
        }
        case 'UNREGISTER': {
            await registry.unregisterPeer(command.peerId);
            logger.info(`🔌 Unregistered peer: ${command.peerId}`);
            logger.info(`Total active peers: ${await registry.getTotalPeers()}`);
            return { status: 'success', message: 'Peer unregistered successfully' };
        }
        case 'HEARTBEAT': {
            await registry.heartbeat(command.peerId);
            logger.debug(`Heartbeat from ${command.peerId}`);
            return { status: 'success', message: 'Heartbeat received' };
        }
    }
}
