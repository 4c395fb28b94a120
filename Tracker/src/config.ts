import Joi from 'joi';

export interface ITrackerConfig {
    host: string;
    port: number;
    peerTimeoutMs: number;
    sweepIntervalMs: number;
    readTimeoutMs: number;
    /** Monitoring endpoint port; disabled when undefined. */
    httpPort?: number;
}

interface IRawTrackerConfig {
    host: string;
    port: number;
    peerTimeout: number;
    sweepInterval: number;
    readTimeout: number;
    httpPort?: number;
}

const configSchema = Joi.object<IRawTrackerConfig>({
    host: Joi.string().required(),
    port: Joi.number().integer().min(0).max(65535).required(),
    peerTimeout: Joi.number().positive().required(),
    sweepInterval: Joi.number().positive().required(),
    readTimeout: Joi.number().positive().required(),
    httpPort: Joi.number().integer().min(0).max(65535).optional(),
});

export const TRACKER_USAGE = `
Peer Tracker Server

Usage: chat-tracker [options]

Options:
  --host <address>          Address to bind (default: 0.0.0.0)
  --port <port>             Control port (default: 5000)
  --peer-timeout <seconds>  Evict peers idle longer than this (default: 300)
  --sweep-interval <secs>   How often eviction runs (default: 60)
  --read-timeout <seconds>  Max wait for a command on a connection (default: 10)
  --http-port <port>        Serve /health, /stats and /peers on this port
  -h, --help                Show this help message

Environment variables:
  TRACKER_HOST, TRACKER_PORT, PEER_TIMEOUT, SWEEP_INTERVAL, READ_TIMEOUT, TRACKER_HTTP_PORT
`;

export class HelpRequested extends Error {
    constructor() {
        super('help requested');
        this.name = 'HelpRequested';
    }
}

/**
 * Builds the tracker configuration. Flags win over environment variables.
 * Throws when a value fails validation.
 */
export function loadTrackerConfig(
    argv: string[] = process.argv.slice(2),
    env: NodeJS.ProcessEnv = process.env,
): ITrackerConfig {
    const raw: Record<string, string | undefined> = {
        host: env.TRACKER_HOST ?? '0.0.0.0',
        port: env.TRACKER_PORT ?? '5000',
        peerTimeout: env.PEER_TIMEOUT ?? '300',
        sweepInterval: env.SWEEP_INTERVAL ?? '60',
        readTimeout: env.READ_TIMEOUT ?? '10',
        httpPort: env.TRACKER_HTTP_PORT,
    };

    const flags: Record<string, string> = {
        '--host': 'host',
        '--port': 'port',
        '--peer-timeout': 'peerTimeout',
        '--sweep-interval': 'sweepInterval',
        '--read-timeout': 'readTimeout',
        '--http-port': 'httpPort',
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg === '--help' || arg === '-h') {
            throw new HelpRequested();
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

    const { error, value } = configSchema.validate(raw);
    if (error) {
        throw new Error(`Invalid tracker configuration: ${error.details[0].message}`);
    }

    return {
        host: value.host,
        port: value.port,
        peerTimeoutMs: value.peerTimeout * 1000,
        sweepIntervalMs: value.sweepInterval * 1000,
        readTimeoutMs: value.readTimeout * 1000,
        httpPort: value.httpPort,
    };
}
