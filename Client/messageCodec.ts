import { IEnvelope } from './Types/MessageTypes.js';
import { DecodeError } from './utils/errors.js';
import { validateEnvelope } from './utils/validation.js';

export const MAX_LINE_BYTES = 1024 * 1024; // 1 MiB

/**
 * Envelopes are newline-delimited JSON. JSON.stringify escapes any newline
 * inside the content, so a line is always exactly one document.
 */
export function encodeEnvelope(envelope: IEnvelope): string {
    return `${JSON.stringify({ type: envelope.type, from: envelope.from, content: envelope.content })}\n`;
}

export function decodeEnvelope(line: string): IEnvelope {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch (error) {
        throw new DecodeError(`Malformed JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const { error, value } = validateEnvelope(parsed);
    if (error) {
        throw new DecodeError(`Invalid envelope: ${error.details[0].message}`);
    }
    return value;
}

/**
 * Splits a text stream into complete lines, holding back a partial tail
 * until the rest arrives.
 */
export class LineDecoder {
    private buffer = '';
    private maxLineBytes: number;

    constructor(maxLineBytes: number = MAX_LINE_BYTES) {
        this.maxLineBytes = maxLineBytes;
    }

    /**
     * Returns every line completed by `chunk`, without terminators and with
     * blank lines dropped. Throws DecodeError once the pending line exceeds the limit.
     */
    push(chunk: string): string[] {
        this.buffer += chunk;
        const lines: string[] = [];

        let newline = this.buffer.indexOf('\n');
        while (newline !== -1) {
            const line = this.buffer.slice(0, newline).replace(/\r$/, '');
            this.buffer = this.buffer.slice(newline + 1);
            if (line.trim().length > 0) {
                lines.push(line);
            }
            newline = this.buffer.indexOf('\n');
        }

        if (Buffer.byteLength(this.buffer) > this.maxLineBytes) {
            this.buffer = '';
            throw new DecodeError(`Line exceeds ${this.maxLineBytes} bytes`);
        }
        return lines;
    }

    /** Whatever is left unterminated when the stream ends. */
    flush(): string | undefined {
        const rest = this.buffer.trim();
        this.buffer = '';
        return rest.length > 0 ? rest : undefined;
    }
}
