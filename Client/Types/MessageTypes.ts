export type MessageType = 'direct' | 'broadcast';

/**
 * What travels between peers, one JSON document per line.
 */
export interface IEnvelope {
    type: MessageType;
    from: string;
    content: string;
}

/**
 * A delivered message as kept in the history. Never mutated.
 */
export interface IChatMessage extends IEnvelope {
    time: Date;
}
