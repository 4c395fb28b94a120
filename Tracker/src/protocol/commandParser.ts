import { TrackerCommand } from '../types.js';
import { ProtocolError } from '../utils/errors.js';
import { validateRegisterArgs } from '../utils/validation.js';

const USAGE = {
    REGISTER: 'REGISTER <peer_id> <ip> <port>',
    UNREGISTER: 'UNREGISTER <peer_id>',
    HEARTBEAT: 'HEARTBEAT <peer_id>',
} as const;

/**
 * Parses one control line: whitespace-separated tokens, case-insensitive verb.
 * Surplus arguments are ignored.
 */
export function parseCommand(line: string): TrackerCommand {
    const parts = line.trim().split(/\s+/).filter(part => part.length > 0);
    if (parts.length === 0) {
        throw new ProtocolError('Empty command');
    }

    const verb = parts[0].toUpperCase();
    switch (verb) {
        case 'REGISTER': {
            if (parts.length < 4) {
                throw new ProtocolError(`Invalid format. Use: ${USAGE.REGISTER}`);
            }
            const { error, value } = validateRegisterArgs({ peerId: parts[1], ip: parts[2], port: parts[3] });
            if (error) {
                throw new ProtocolError(`Invalid REGISTER arguments: ${error.details[0].message}`);
            }
            return { verb: 'REGISTER', peerId: value.peerId, ip: value.ip, port: value.port };
        }
        case 'GET_PEERS':
            return { verb: 'GET_PEERS' };
        case 'UNREGISTER':
        case 'HEARTBEAT': {
            if (parts.length < 2) {
                throw new ProtocolError(`Invalid format. Use: ${USAGE[verb]}`);
            }
            return { verb, peerId: parts[1] };
        }
        default:
            throw new ProtocolError('Unknown command');
    }
}
