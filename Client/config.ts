import Joi from 'joi';
import { detectLocalAddress } from './utils/network.js';

export interface IClientConfig {
    peerId: string;
    listenPort: number;
    advertiseHost: string;
    trackerHost: string;
    trackerPort: number;
    heartbeatIntervalMs: number;
    requestTimeoutMs: number;
}

interface IRawClientConfig {
    peerId: string;
    port: number;
    host: string;
    trackerHost: string;
    trackerPort: number;
    heartbeatInterval: number;
    requestTimeout: number;
}

const configSchema = Joi.object<IRawClientConfig>({
    peerId: Joi.string().pattern(/^\S+$/).max(256).required()
        .messages({ 'string.pattern.base': '"peer_id" must not contain whitespace', 'any.required': '"peer_id" is required' }),
    port: Joi.number().integer().min(1).max(65535).required(),
    host: Joi.string().required(),
    trackerHost: Joi.string().required(),
    trackerPort: Joi.number().integer().min(1).max(65535).required(),
    heartbeatInterval: Joi.number().positive().required(),
    requestTimeout: Joi.number().positive().required(),
});

export const CLIENT_USAGE = `
P2P Chat Client

Usage: chat-peer <peer_id> [options]

Options:
  --port <port>                 Port for incoming P2P connections (default: 6000)
  --host <address>              Address other peers should dial (default: detected)
  --tracker-host <host>         Tracker host (default: 127.0.0.1)
  --tracker-port <port>         Tracker port (default: 5000)
  --heartbeat-interval <secs>   Seconds between heartbeats (default: 60)
  --request-timeout <secs>      Max wait for a tracker reply (default: 10)
  -h, --help                    Show this help message

Environment variables:
  CHAT_PORT, CHAT_ADVERTISE_HOST, TRACKER_HOST, TRACKER_PORT, HEARTBEAT_INTERVAL
`;

export class HelpRequested extends Error {
    constructor() {
        super('help requested');
        this.name = 'HelpRequested';
    }
}

/**
 * Builds the client configuration. Flags win over environment variables.
 */
export function loadClientConfig(
    argv: string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
    detectHost: () => string = detectLocalAddress,
): IClientConfig {
    const raw: Record<string, string | undefined> = {
        peerId: undefined,
        port: env.CHAT_PORT ?? '6000',
        host: env.CHAT_ADVERTISE_HOST,
        trackerHost: env.CHAT_TRACKER_HOST ?? '127.0.0.1',
        trackerPort: env.TRACKER_PORT ?? '5000',
        heartbeatInterval: env.HEARTBEAT_INTERVAL ?? '60',
        requestTimeout: '10',
    };

    const flags: Record<string, string> = {
        '--port': 'port',
        '--host': 'host',
        '--tracker-host': 'trackerHost',
        '--tracker-port': 'trackerPort',
        '--heartbeat-interval': 'heartbeatInterval',
        '--request-timeout': 'requestTimeout',
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--help' || arg === '-h') {
            throw new HelpRequested();
        }
        if (!arg.startsWith('--')) {
            if (raw.peerId !== undefined) {
                throw new Error(`Unexpected argument: ${arg}`);
            }
            raw.peerId = arg;
            continue;
        }
        const key = flags[arg];
        if (!key) {
            throw new Error(`Unknown option: ${arg}`);
        }
        if (argv[i + 1] === undefined) {
            throw new Error(`Missing value for ${arg}`);
        }
        raw[key] = argv[i + 1];
        i++;
    }

    if (raw.host === undefined) {
        raw.host = detectHost();
    }

    const { error, value } = configSchema.validate(raw);
    if (error) {
        throw new Error(`Invalid client configuration: ${error.details[0].message}`);
    }

    return {
        peerId: value.peerId,
        listenPort: value.port,
        advertiseHost: value.host,
        trackerHost: value.trackerHost,
        trackerPort: value.trackerPort,
        heartbeatIntervalMs: value.heartbeatInterval * 1000,
        requestTimeoutMs: value.requestTimeout * 1000,
    };
}
