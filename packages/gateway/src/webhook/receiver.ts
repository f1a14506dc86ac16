/**
 * Webhook receiver
 *
 * Handles one POSTed body at a time: answers the URL verification
 * challenge, or de-duplicates an event by sn and hands it to the sink.
 * Shares nothing with the gateway session.
 */

import {
  AuthenticationError,
  DecodeError,
  isNonNegativeInteger,
  isObject,
  isString,
  parseEventData,
} from '@kookgate/core';
import { WEBHOOK_CHALLENGE_CHANNEL } from '../config/defaults.js';
import { safeKeyCompare } from '../routes/helpers.js';
import type { WebhookEventSink, WebhookOutcome } from '../types/index.js';
import { getLog } from '../services/log.js';
import { SequenceWindow } from './sequence-window.js';

const log = getLog('WebhookReceiver');

export interface WebhookReceiverOptions {
  verifyToken: string;
  sink: WebhookEventSink;
  /** Recently seen sequence numbers kept for de-duplication */
  dedupCapacity?: number;
}

interface Challenge {
  challenge: string;
  verifyToken: string | undefined;
}

export class WebhookReceiver {
  private readonly verifyToken: string;
  private readonly sink: WebhookEventSink;
  private readonly window: SequenceWindow;

  constructor(options: WebhookReceiverOptions) {
    this.verifyToken = options.verifyToken;
    this.sink = options.sink;
    this.window = new SequenceWindow(options.dedupCapacity);
  }

  /** Sequence numbers currently remembered */
  get seenCount(): number {
    return this.window.size;
  }

  /**
   * Process one decoded JSON body.
   *
   * @throws AuthenticationError when a verify token does not match
   * @throws DecodeError when the body is neither a challenge nor a valid event
   */
  async handle(body: unknown): Promise<WebhookOutcome> {
    if (!isObject(body)) {
      throw new DecodeError('malformed', 'webhook body is not an object');
    }

    const challenge = extractChallenge(body);
    if (challenge) {
      if (!safeKeyCompare(challenge.verifyToken, this.verifyToken)) {
        log.warn('Rejected webhook challenge with a mismatched verify token');
        throw new AuthenticationError('Webhook verify token mismatch');
      }
      log.info('Webhook challenge answered');
      return { type: 'challenge', challenge: challenge.challenge };
    }

    const { sn, d } = body;
    if (!isNonNegativeInteger(sn)) {
      throw new DecodeError('malformed', 'webhook body is neither a challenge nor an event');
    }

    // KOOK repeats the verify token inside every event payload. It is
    // checked before the sn is looked at so a forged event cannot claim it.
    if (this.verifyToken) {
      const token = isObject(d) ? d.verify_token : undefined;
      if (!isString(token) || !safeKeyCompare(token, this.verifyToken)) {
        log.warn('Rejected webhook event with a missing or mismatched verify token', { sn });
        throw new AuthenticationError('Webhook verify token mismatch');
      }
    }

    if (this.window.has(sn)) {
      log.debug('Dropping duplicate webhook event', { sn });
      return { type: 'event', sequence: sn, duplicate: true };
    }

    const parsed = parseEventData(d);
    if (!parsed.ok) {
      throw parsed.error;
    }

    // Claimed before dispatch so a concurrent redelivery is suppressed;
    // released again if the sink fails so the retry is processed.
    this.window.add(sn);
    try {
      await this.sink.onEvent(parsed.value, sn);
    } catch (error) {
      this.window.delete(sn);
      throw error;
    }

    log.debug('Webhook event delivered', { sn, type: parsed.value.type });
    return { type: 'event', sequence: sn, duplicate: false };
  }
}

/**
 * Challenge bodies come either bare or wrapped as a signal:
 *   { challenge, verify_token }
 *   { s: 0, d: { channel_type: 'WEBHOOK_CHALLENGE', challenge, verify_token } }
 */
function extractChallenge(body: Record<string, unknown>): Challenge | null {
  if (isString(body.challenge)) {
    return {
      challenge: body.challenge,
      verifyToken: isString(body.verify_token) ? body.verify_token : undefined,
    };
  }
  const { d } = body;
  if (isObject(d) && d.channel_type === WEBHOOK_CHALLENGE_CHANNEL && isString(d.challenge)) {
    return {
      challenge: d.challenge,
      verifyToken: isString(d.verify_token) ? d.verify_token : undefined,
    };
  }
  return null;
}
