import { describe, expect, it } from 'vitest';
import { decodeEnvelope, encodeEnvelope, LineDecoder } from '../messageCodec.js';
import { DecodeError } from '../utils/errors.js';

describe('encodeEnvelope', () => {
    it('writes one JSON document terminated by a newline', () => {
        expect(encodeEnvelope({ type: 'direct', from: 'alice', content: 'hi' })).toBe(
            '{"type":"direct","from":"alice","content":"hi"}\n',
        );
    });

    it('escapes newlines inside the content', () => {
        const encoded = encodeEnvelope({ type: 'broadcast', from: 'alice', content: 'line one\nline two' });

        expect(encoded.indexOf('\n')).toBe(encoded.length - 1);
        expect(decodeEnvelope(encoded.trim()).content).toBe('line one\nline two');
    });
});

describe('decodeEnvelope', () => {
    it('returns the envelope fields and drops unknown ones', () => {
        expect(decodeEnvelope('{"type":"broadcast","from":"bob","content":"yo","extra":1}')).toEqual({
            type: 'broadcast',
            from: 'bob',
            content: 'yo',
        });
    });

    it('rejects malformed JSON', () => {
        expect(() => decodeEnvelope('{"type":')).toThrow(DecodeError);
    });

    it('rejects an unknown message type', () => {
        expect(() => decodeEnvelope('{"type":"shout","from":"bob","content":"yo"}')).toThrow(
            'Invalid envelope: "type" must be one of [direct, broadcast]',
        );
    });

    it('rejects a missing sender', () => {
        expect(() => decodeEnvelope('{"type":"direct","content":"yo"}')).toThrow(
            'Invalid envelope: "from" is required',
        );
    });
});

describe('LineDecoder', () => {
    it('holds back a partial line until the rest arrives', () => {
        const decoder = new LineDecoder();

        expect(decoder.push('{"a":1}\n{"b"')).toEqual(['{"a":1}']);
        expect(decoder.push(':2}\n')).toEqual(['{"b":2}']);
    });

    it('splits several lines in one chunk and skips blank ones', () => {
        const decoder = new LineDecoder();

        expect(decoder.push('one\r\n\ntwo\nthree\n')).toEqual(['one', 'two', 'three']);
    });

    it('returns the unterminated tail on flush', () => {
        const decoder = new LineDecoder();
        decoder.push('tail');

        expect(decoder.flush()).toBe('tail');
        expect(decoder.flush()).toBeUndefined();
    });

    it('refuses a line longer than the limit', () => {
        const decoder = new LineDecoder(8);

        expect(() => decoder.push('123456789')).toThrow('Line exceeds 8 bytes');
    });
});
