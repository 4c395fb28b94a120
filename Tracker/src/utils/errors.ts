export type TrackerErrorCode =
  | 'PROTOCOL_ERROR'
  | 'PEER_NOT_FOUND';

export class TrackerError extends Error {
  readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string) {
    super(message);
    this.name = 'TrackerError';
    this.code = code;
  }
}

/** Malformed command: wrong verb arity, bad argument values, oversized input. */
export class ProtocolError extends TrackerError {
  constructor(message: string) {
    super('PROTOCOL_ERROR', message);
    this.name = 'ProtocolError';
  }
}

export class PeerNotFoundError extends TrackerError {
  readonly peerId: string;

  constructor(peerId: string) {
    super('PEER_NOT_FOUND', 'Peer not found');
    this.name = 'PeerNotFoundError';
    this.peerId = peerId;
  }
}
