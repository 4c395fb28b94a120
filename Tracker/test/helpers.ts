import net from 'net';

/**
 * Sends one raw control command and resolves with the parsed JSON reply.
 */
export function sendRaw(port: number, payload: string, options: { halfClose?: boolean } = {}): Promise<unknown> {
    return new Promise((resolve, reject) => {
        let response = '';
        const socket = net.createConnection({ host: '127.0.0.1', port }, () => {
            if (options.halfClose) {
                socket.end(payload);
            } else if (payload.length > 0) {
                socket.write(payload);
            }
        });
        socket.setEncoding('utf8');
        socket.on('data', (chunk: string) => {
            response += chunk;
        });
        socket.on('end', () => {
            try {
                resolve(JSON.parse(response));
            } catch (error) {
                reject(error);
            }
        });
        socket.on('error', reject);
    });
}

/** Resolves once `predicate` holds, polling on real timers. */
export async function eventually(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!predicate()) {
        if (Date.now() > deadline) {
            throw new Error('condition not met in time');
        }
        await new Promise((resolve) => setTimeout(resolve, 10));
    }
}
