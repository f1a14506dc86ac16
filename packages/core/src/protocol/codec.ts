/**
 * Frame Codec
 *
 * Stateless decoding of inbound frames into Signals and encoding of the
 * client's control frames. Failures come back as DecodeError results so
 * the caller can drop the frame and keep reading.
 */

import { unzipSync } from 'node:zlib';
import { type Result, ok, err, andThen, fromThrowable } from '../types/result.js';
import { DecodeError, getErrorMessage } from '../types/errors.js';
import {
  isObject,
  isString,
  isNonEmptyString,
  isNumber,
  isInteger,
  isNonNegativeInteger,
} from '../types/guards.js';
import { SignalCode, type Signal, type EventData } from './signal.js';

/** A frame as it comes off the transport: text, or binary bytes */
export type RawFrame = string | Uint8Array;

function malformed(message: string): Result<never, DecodeError> {
  return err(new DecodeError('malformed', message));
}

/**
 * Inflate a zlib or gzip payload into UTF-8 text
 */
export function decompress(bytes: Uint8Array): Result<string, DecodeError> {
  return fromThrowable(
    () => unzipSync(bytes).toString('utf8'),
    (error) => new DecodeError('decompress', getErrorMessage(error), { cause: error })
  );
}

/**
 * Decode a raw frame. Binary frames are inflated first when the
 * connection was opened with compression; text frames never are.
 */
export function decodeFrame(raw: RawFrame, compress: boolean): Result<Signal, DecodeError> {
  if (typeof raw === 'string') {
    return parseSignal(raw);
  }
  const text: Result<string, DecodeError> = compress
    ? decompress(raw)
    : ok(Buffer.from(raw).toString('utf8'));
  return andThen(text, parseSignal);
}

/**
 * Parse the JSON text of one frame into a Signal
 */
export function parseSignal(text: string): Result<Signal, DecodeError> {
  const parsed = fromThrowable(
    (): unknown => JSON.parse(text),
    (error) => new DecodeError('malformed', getErrorMessage(error), { cause: error })
  );
  return andThen(parsed, toSignal);
}

function toSignal(envelope: unknown): Result<Signal, DecodeError> {
  if (!isObject(envelope) || !isInteger(envelope.s)) {
    return malformed('missing signal opcode');
  }
  const { s, d, sn } = envelope;

  switch (s) {
    case SignalCode.Event:
      if (!isNonNegativeInteger(sn)) {
        return malformed('event signal without sn');
      }
      return ok<Signal>({ kind: 'event', sequence: sn, payload: d });

    case SignalCode.Hello:
      if (!isObject(d) || !isInteger(d.code)) {
        return malformed('hello signal without code');
      }
      return ok<Signal>({
        kind: 'hello',
        payload: {
          code: d.code,
          session_id: isNonEmptyString(d.session_id) ? d.session_id : undefined,
        },
      });

    case SignalCode.Pong:
      return ok<Signal>({ kind: 'heartbeat_ack' });

    case SignalCode.Reconnect: {
      const data = isObject(d) ? d : {};
      return ok<Signal>({
        kind: 'reconnect',
        payload: {
          code: isInteger(data.code) ? data.code : 0,
          reason: isString(data.err) ? data.err : 'Unknown',
        },
      });
    }

    case SignalCode.ResumeAck:
      return ok<Signal>({
        kind: 'resume_ack',
        payload: {
          sessionId: isObject(d) && isNonEmptyString(d.session_id) ? d.session_id : undefined,
        },
      });

    default:
      return ok<Signal>({ kind: 'unknown', opcode: s, payload: d });
  }
}

/**
 * Heartbeat frame carrying the last delivered sequence number
 */
export function encodeHeartbeat(sequence: number): string {
  return JSON.stringify({ s: SignalCode.Ping, sn: sequence });
}

/**
 * Validate an event payload. Used by the stream and the webhook path.
 */
export function parseEventData(payload: unknown): Result<EventData, DecodeError> {
  if (!isObject(payload)) {
    return malformed('event payload is not an object');
  }
  const { channel_type, type, target_id, author_id, content, msg_id, msg_timestamp, nonce, extra } =
    payload;

  if (!isString(channel_type)) return malformed('event payload without channel_type');
  if (!isInteger(type)) return malformed('event payload without type');
  if (!isString(target_id)) return malformed('event payload without target_id');
  if (!isString(author_id)) return malformed('event payload without author_id');
  if (!isString(content)) return malformed('event payload without content');
  if (!isString(msg_id)) return malformed('event payload without msg_id');
  if (!isNumber(msg_timestamp)) return malformed('event payload without msg_timestamp');

  return ok<EventData>({
    channel_type,
    type,
    target_id,
    author_id,
    content,
    msg_id,
    msg_timestamp,
    nonce: isString(nonce) ? nonce : '',
    extra: isObject(extra) ? extra : {},
  });
}
