/**
 * Gateway wire protocol
 *
 * Every frame is a JSON envelope `{ s, d, sn? }` where `s` is the opcode,
 * `d` the payload and `sn` the sequence number of an event.
 */

export const SignalCode = {
  /** server -> client: event, carries sn */
  Event: 0,
  /** server -> client: handshake result */
  Hello: 1,
  /** client -> server: heartbeat, carries the last delivered sn */
  Ping: 2,
  /** server -> client: heartbeat acknowledgement */
  Pong: 3,
  /** client -> server: resume request */
  Resume: 4,
  /** server -> client: drop local state and reconnect */
  Reconnect: 5,
  /** server -> client: resume accepted */
  ResumeAck: 6,
} as const;

export type SignalCode = (typeof SignalCode)[keyof typeof SignalCode];

/** Hello code for an accepted handshake; 40100-40103 are token failures */
export const HELLO_OK = 0;

export interface HelloData {
  code: number;
  session_id?: string;
}

export interface ReconnectData {
  code: number;
  reason: string;
}

export interface ResumeAckData {
  sessionId?: string;
}

export interface EventSignal {
  readonly kind: 'event';
  readonly sequence: number;
  readonly payload: unknown;
}

export interface HelloSignal {
  readonly kind: 'hello';
  readonly payload: HelloData;
}

export interface HeartbeatAckSignal {
  readonly kind: 'heartbeat_ack';
}

export interface ReconnectSignal {
  readonly kind: 'reconnect';
  readonly payload: ReconnectData;
}

export interface ResumeAckSignal {
  readonly kind: 'resume_ack';
  readonly payload: ResumeAckData;
}

export interface UnknownSignal {
  readonly kind: 'unknown';
  readonly opcode: number;
  readonly payload: unknown;
}

/**
 * One decoded frame, tagged by kind
 */
export type Signal =
  | EventSignal
  | HelloSignal
  | HeartbeatAckSignal
  | ReconnectSignal
  | ResumeAckSignal
  | UnknownSignal;

export type SignalKind = Signal['kind'];

/**
 * Event payload delivered to the consumer
 */
export interface EventData {
  /** GROUP, PERSON, BROADCAST or WEBHOOK_CHALLENGE */
  channel_type: string;
  /** 1 text, 2 image, 9 KMarkdown, 10 card, 255 system notification */
  type: number;
  target_id: string;
  author_id: string;
  content: string;
  msg_id: string;
  /** Milliseconds since the epoch */
  msg_timestamp: number;
  nonce: string;
  extra: Record<string, unknown>;
}

/** Message type used for system notifications rather than chat messages */
export const SYSTEM_EVENT_TYPE = 255;
