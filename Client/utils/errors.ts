export type ChatErrorCode =
    | 'PEER_UNKNOWN'
    | 'CONNECT_FAILED'
    | 'UNREACHABLE'
    | 'DECODE_ERROR'
    | 'TRACKER_ERROR'
    | 'REGISTRATION_FAILED';

export class ChatError extends Error {
    readonly code: ChatErrorCode;

    constructor(code: ChatErrorCode, message: string) {
        super(message);
        this.name = 'ChatError';
        this.code = code;
    }
}

export class PeerUnknownError extends ChatError {
    constructor(peerId: string) {
        super('PEER_UNKNOWN', `Peer ${peerId} not found`);
        this.name = 'PeerUnknownError';
    }
}

export class ConnectFailedError extends ChatError {
    constructor(peerId: string, cause: string) {
        super('CONNECT_FAILED', `Error connecting to peer ${peerId}: ${cause}`);
        this.name = 'ConnectFailedError';
    }
}

/** The socket failed while a message was being written. */
export class UnreachableError extends ChatError {
    constructor(peerId: string, cause: string) {
        super('UNREACHABLE', `Peer ${peerId} is unreachable: ${cause}`);
        this.name = 'UnreachableError';
    }
}

export class DecodeError extends ChatError {
    constructor(message: string) {
        super('DECODE_ERROR', message);
        this.name = 'DecodeError';
    }
}

export class TrackerRequestError extends ChatError {
    readonly command: string;

    constructor(command: string, message: string) {
        super('TRACKER_ERROR', message);
        this.name = 'TrackerRequestError';
        this.command = command;
    }
}

export class RegistrationFailedError extends ChatError {
    constructor(message: string) {
        super('REGISTRATION_FAILED', message);
        this.name = 'RegistrationFailedError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
