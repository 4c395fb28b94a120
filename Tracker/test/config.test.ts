import { describe, expect, it } from 'vitest';
import { HelpRequested, loadTrackerConfig } from '../src/config.js';

describe('loadTrackerConfig', () => {
    it('falls back to defaults', () => {
        expect(loadTrackerConfig([], {})).toEqual({
            host: '0.0.0.0',
            port: 5000,
            peerTimeoutMs: 300_000,
            sweepIntervalMs: 60_000,
            readTimeoutMs: 10_000,
            httpPort: undefined,
        });
    });

    it('reads the environment and lets flags override it', () => {
        const config = loadTrackerConfig(
            ['--port', '5500', '--sweep-interval', '5'],
            { TRACKER_PORT: '5100', PEER_TIMEOUT: '30', TRACKER_HTTP_PORT: '5080' },
        );

        expect(config.port).toBe(5500);
        expect(config.peerTimeoutMs).toBe(30_000);
        expect(config.sweepIntervalMs).toBe(5_000);
        expect(config.httpPort).toBe(5080);
    });

    it('rejects invalid values', () => {
        expect(() => loadTrackerConfig(['--port', 'abc'], {})).toThrow(
            'Invalid tracker configuration: "port" must be a number',
        );
    });

    it('rejects unknown flags and missing values', () => {
        expect(() => loadTrackerConfig(['--verbose'], {})).toThrow('Unknown option: --verbose');
        expect(() => loadTrackerConfig(['--port'], {})).toThrow('Missing value for --port');
    });

    it('signals a help request', () => {
        expect(() => loadTrackerConfig(['-h'], {})).toThrow(HelpRequested);
    });
});
