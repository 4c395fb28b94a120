import net from 'net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ChatClient, ClientState } from '../client.js';
import { PeerDirectory } from '../peerDirectory.js';
import { RegistrationFailedError } from '../utils/errors.js';
import { eventually, FakeTracker, getFreePort } from './helpers.js';

interface ISink {
    server: net.Server;
    port: number;
    lines: string[];
}

async function startSink(): Promise<ISink> {
    const lines: string[] = [];
    const server = net.createServer((socket) => {
        socket.setEncoding('utf8');
        socket.on('data', (chunk: string) => {
            lines.push(...chunk.split('\n').filter(line => line.length > 0));
        });
        socket.on('error', () => undefined);
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    return { server, port: typeof address === 'object' && address ? address.port : 0, lines };
}

function closeSink(sink: ISink): Promise<void> {
    return new Promise((resolve) => sink.server.close(() => resolve()));
}

describe('ChatClient', () => {
    let tracker: FakeTracker;
    let directory: PeerDirectory;
    let client: ChatClient;

    beforeEach(async () => {
        tracker = new FakeTracker();
        directory = new PeerDirectory();
        client = new ChatClient({
            peerId: 'alice',
            listenPort: await getFreePort(),
            listenHost: '127.0.0.1',
            advertiseHost: '127.0.0.1',
            heartbeatIntervalMs: 60_000,
            connectTimeoutMs: 1000,
        }, tracker, directory);
    });

    afterEach(async () => {
        await client.stop();
        vi.useRealTimers();
    });

    it('walks through registering and running on start', async () => {
        const states: ClientState[] = [];
        client.on('state', (state) => states.push(state));
        tracker.peers = [{ peerId: 'bob', address: '127.0.0.1', port: 6002 }];

        const peerCount = await client.start();

        expect(peerCount).toBe(2);
        expect(states).toEqual(['registering', 'running']);
        expect(tracker.calls[0]).toMatch(/^REGISTER alice 127\.0\.0\.1 \d+$/);
        expect(tracker.calls[1]).toBe('GET_PEERS');
    });

    it('aborts startup when registration fails', async () => {
        tracker.failRegister = true;

        await expect(client.start()).rejects.toBeInstanceOf(RegistrationFailedError);
        expect(client.state).toBe('stopped');
        expect(tracker.calls).toEqual([expect.stringMatching(/^REGISTER alice/)]);
    });

    it('stays stopped when stopped while registering', async () => {
        const starting = client.start();
        await client.stop();

        await expect(starting).rejects.toThrow('Client was stopped while starting');
        expect(client.state).toBe('stopped');
        expect(tracker.calls).toEqual([expect.stringMatching(/^REGISTER alice/), 'UNREGISTER alice']);
    });

    it('never caches itself when refreshing peers', async () => {
        tracker.peers = [
            { peerId: 'alice', address: '127.0.0.1', port: 6001 },
            { peerId: 'bob', address: '127.0.0.1', port: 6002 },
        ];

        expect(await client.refreshPeers()).toBe(1);
        expect(client.peers()).toEqual([{ peerId: 'bob', address: '127.0.0.1', port: 6002, connected: false }]);
    });

    it('keeps peers the tracker stopped reporting', async () => {
        tracker.peers = [{ peerId: 'bob', address: '127.0.0.1', port: 6002 }];
        await client.refreshPeers();
        tracker.peers = [];

        await client.refreshPeers();

        expect(directory.has('bob')).toBe(true);
    });

    it('reports an unknown peer on a direct send', async () => {
        expect(await client.sendDirect('ghost', 'hello')).toEqual({ ok: false, reason: 'Peer ghost not found' });
    });

    it('sends a direct envelope over a lazily opened connection', async () => {
        const sink = await startSink();
        directory.upsert({ peerId: 'bob', address: '127.0.0.1', port: sink.port });

        expect(await client.sendDirect('bob', 'hi')).toEqual({ ok: true });

        await eventually(() => sink.lines.length === 1);
        expect(JSON.parse(sink.lines[0])).toEqual({ type: 'direct', from: 'alice', content: 'hi' });
        expect(client.peers()[0].connected).toBe(true);
        await client.stop();
        await closeSink(sink);
    });

    it('counts broadcast successes and skips unreachable peers', async () => {
        const sinks = [await startSink(), await startSink()];
        directory.upsert({ peerId: 'bob', address: '127.0.0.1', port: sinks[0].port });
        directory.upsert({ peerId: 'carol', address: '127.0.0.1', port: sinks[1].port });
        directory.upsert({ peerId: 'dave', address: '127.0.0.1', port: await getFreePort() });

        const result = await client.broadcast('hello all');

        expect(result).toEqual({ sentCount: 2, failed: ['dave'] });
        await eventually(() => sinks.every(sink => sink.lines.length === 1));
        expect(JSON.parse(sinks[1].lines[0])).toEqual({ type: 'broadcast', from: 'alice', content: 'hello all' });
        await client.stop();
        await Promise.all(sinks.map(closeSink));
    });

    it('reports zero sent when every peer is unreachable', async () => {
        directory.upsert({ peerId: 'bob', address: '127.0.0.1', port: await getFreePort() });

        expect(await client.broadcast('anyone?')).toEqual({ sentCount: 0, failed: ['bob'] });
    });

    it('sends heartbeats on every tick and keeps going after a failure', async () => {
        vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
        await client.start();
        tracker.calls = [];
        tracker.failHeartbeats = 1;

        await vi.advanceTimersByTimeAsync(60_000);
        await vi.advanceTimersByTimeAsync(60_000);

        expect(tracker.calls).toEqual(['HEARTBEAT alice', 'HEARTBEAT alice']);
        expect(tracker.failHeartbeats).toBe(0);
    });

    it('stops the heartbeat once stopped', async () => {
        vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
        await client.start();
        await client.stop();
        tracker.calls = [];

        await vi.advanceTimersByTimeAsync(120_000);

        expect(tracker.calls).toEqual([]);
    });

    it('unregisters and releases its port on stop', async () => {
        const states: ClientState[] = [];
        await client.start();
        client.on('state', (state) => states.push(state));

        await client.stop();
        await client.stop();

        expect(states).toEqual(['stopping', 'stopped']);
        expect(tracker.calls).toContain('UNREGISTER alice');
    });

    it('returns the most recent history entries as copies', async () => {
        const port = await getFreePort();
        const receiver = new ChatClient({
            peerId: 'bob',
            listenPort: port,
            listenHost: '127.0.0.1',
            advertiseHost: '127.0.0.1',
        }, new FakeTracker());
        await receiver.start();
        directory.upsert({ peerId: 'bob', address: '127.0.0.1', port });

        for (const text of ['one', 'two', 'three']) {
            await client.sendDirect('bob', text);
        }
        await eventually(() => receiver.history().length === 3);

        expect(receiver.history(2).map(message => message.content)).toEqual(['two', 'three']);
        const [first] = receiver.history();
        first.content = 'edited';
        expect(receiver.history()[0].content).toBe('one');
        await receiver.stop();
    });
});
