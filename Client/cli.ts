import { ChatClient } from './client.js';
import { IChatMessage } from './Types/MessageTypes.js';
import { describeError } from './utils/errors.js';

export type Printer = (line: string) => void;

const HISTORY_LIMIT = 20;

export const HELP_TEXT = [
    'Chat Commands:',
    '  /msg <peer_id> <message>  - Send direct message',
    '  /broadcast <message>      - Broadcast to all peers',
    '  /peers                    - List available peers',
    '  /refresh                  - Refresh peer list',
    '  /history                  - Show message history',
    '  /help                     - Show this list',
    '  /quit                     - Exit chat',
].join('\n');

export function formatIncoming(message: IChatMessage): string {
    const label = message.type === 'direct' ? 'Direct message' : 'Broadcast';
    return `[${message.from}] ${label}: ${message.content}`;
}

/**
 * The interactive command loop's interpreter: one line in, printed output out.
 */
export class ChatCli {
    private client: ChatClient;
    private print: Printer;

    constructor(client: ChatClient, print: Printer) {
        this.client = client;
        this.print = print;
    }

    /**
     * Runs one command line. Resolves false once the user has quit.
     */
    public async execute(input: string): Promise<boolean> {
        const command = input.trim();
        if (!command) {
            return true;
        }

        try {
            if (command.startsWith('/msg ')) {
                await this.sendDirect(command);
            } else if (command.startsWith('/broadcast ')) {
                await this.broadcast(command.slice('/broadcast '.length).trim());
            } else if (command === '/peers') {
                this.listPeers();
            } else if (command === '/refresh') {
                const count = await this.client.refreshPeers();
                this.print(`Updated peer list: ${count} peers available`);
            } else if (command === '/history') {
                this.showHistory();
            } else if (command === '/help') {
                this.print(HELP_TEXT);
            } else if (command === '/quit') {
                this.print('Exiting...');
                await this.client.stop();
                return false;
            } else {
                this.print('Unknown command. Type /help for available commands');
            }
        } catch (error) {
            this.print(`Error: ${describeError(error)}`);
        }
        return true;
    }

    private async sendDirect(command: string): Promise<void> {
        const match = /^\/msg\s+(\S+)\s+(.+)$/.exec(command);
        if (!match) {
            this.print('Usage: /msg <peer_id> <message>');
            return;
        }
        const [, peerId, content] = match;
        const result = await this.client.sendDirect(peerId, content);
        if (result.ok) {
            this.print(`Sent direct message to ${peerId}`);
        } else {
            this.print(`Could not send to ${peerId}: ${result.reason}`);
        }
    }

    private async broadcast(content: string): Promise<void> {
        if (!content) {
            this.print('Usage: /broadcast <message>');
            return;
        }
        const { sentCount, failed } = await this.client.broadcast(content);
        this.print(`Broadcast sent to ${sentCount} peers`);
        if (failed.length > 0) {
            this.print(`Unreachable: ${failed.join(', ')}`);
        }
    }

    private listPeers(): void {
        const peers = this.client.peers();
        if (peers.length === 0) {
            this.print('No peers available');
            return;
        }
        this.print('Available peers:');
        for (const peer of peers) {
            const status = peer.connected ? 'connected' : 'available';
            this.print(`  ${peer.peerId} - ${peer.address}:${peer.port} [${status}]`);
        }
    }

    private showHistory(): void {
        const messages = this.client.history(HISTORY_LIMIT);
        if (messages.length === 0) {
            this.print('No message history');
            return;
        }
        this.print('Message history:');
        for (const message of messages) {
            this.print(`  [${message.type}] ${message.from}: ${message.content}`);
        }
    }
}
