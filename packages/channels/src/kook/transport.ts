/**
 * WebSocket transport over `ws`
 *
 * Adapts the socket's push-style events to the pull-style Transport the
 * gateway session reads from: inbound frames queue up until receive()
 * takes them.
 */

import { WebSocket, type RawData } from 'ws';
import {
  TransportError,
  getErrorMessage,
  type OpenTransportOptions,
  type RawFrame,
  type ReceiveResult,
  type Transport,
} from '@kookgate/core';
import { getLog } from '../log.js';

const log = getLog('WebSocketTransport');

/** Normal closure */
const CLOSE_NORMAL = 1000;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

interface PendingReceive {
  settle(result: ReceiveResult): void;
  fail(error: TransportError): void;
}

export class WebSocketTransport implements Transport {
  private readonly inbox: RawFrame[] = [];
  private pending: PendingReceive | null = null;
  private closedWith: { code: number; reason: string } | null = null;
  private failure: TransportError | null = null;

  constructor(private readonly socket: WebSocket) {
    socket.on('message', (data: RawData, isBinary: boolean) => {
      const buffer = toBuffer(data);
      this.push(isBinary ? buffer : buffer.toString('utf8'));
    });

    socket.on('error', (error: Error) => {
      log.warn('WebSocket error', { error: error.message });
      this.failure = new TransportError(`WebSocket error: ${error.message}`, { cause: error });
      const pending = this.pending;
      this.pending = null;
      pending?.fail(this.failure);
    });

    socket.on('close', (code: number, reason: Buffer) => {
      this.finish(code, reason.toString('utf8'));
    });
  }

  /** Frames received but not yet taken */
  get queued(): number {
    return this.inbox.length;
  }

  send(data: string): Promise<void> {
    if (this.closedWith || this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportError('WebSocket is not open'));
    }
    return new Promise((resolve, reject) => {
      this.socket.send(data, (error?: Error) => {
        if (error) {
          reject(new TransportError(`WebSocket send failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(timeoutMs: number): Promise<ReceiveResult> {
    const frame = this.inbox.shift();
    if (frame !== undefined) {
      return Promise.resolve({ type: 'frame', data: frame });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closedWith) {
      return Promise.resolve({ type: 'closed', ...this.closedWith });
    }
    if (this.pending) {
      return Promise.reject(new TransportError('receive() is already pending'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        resolve({ type: 'timeout' });
      }, timeoutMs);

      this.pending = {
        settle: (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        fail: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  async close(code: number = CLOSE_NORMAL, reason = ''): Promise<void> {
    if (this.closedWith) return;
    if (
      this.socket.readyState === WebSocket.OPEN ||
      this.socket.readyState === WebSocket.CONNECTING
    ) {
      this.socket.close(code, reason);
    }
    this.finish(code, reason);
  }

  private push(frame: RawFrame): void {
    const pending = this.pending;
    if (pending) {
      this.pending = null;
      pending.settle({ type: 'frame', data: frame });
    } else {
      this.inbox.push(frame);
    }
  }

  private finish(code: number, reason: string): void {
    if (this.closedWith) return;
    this.closedWith = { code, reason };
    const pending = this.pending;
    this.pending = null;
    pending?.settle({ type: 'closed', code, reason });
  }
}

/**
 * Open a WebSocket and wrap it once the handshake completes.
 * Matches the TransportFactory signature.
 */
export function openWebSocketTransport(
  url: string,
  options: OpenTransportOptions
): Promise<Transport> {
  return new Promise((resolve, reject) => {
    if (options.signal.aborted) {
      reject(new TransportError('Connection attempt aborted'));
      return;
    }

    const socket = new WebSocket(url, { handshakeTimeout: options.timeoutMs });

    const cleanup = () => {
      socket.off('open', onOpen);
      socket.off('error', onError);
      options.signal.removeEventListener('abort', onAbort);
    };
    const onOpen = () => {
      cleanup();
      resolve(new WebSocketTransport(socket));
    };
    const onError = (error: Error) => {
      cleanup();
      reject(new TransportError(`WebSocket connection failed: ${error.message}`, { cause: error }));
    };
    const onAbort = () => {
      cleanup();
      // terminate() during the handshake reports one last error
      socket.once('error', (error: Error) => {
        log.debug('Handshake abandoned', { error: getErrorMessage(error) });
      });
      socket.terminate();
      reject(new TransportError('Connection attempt aborted'));
    };

    socket.on('open', onOpen);
    socket.on('error', onError);
    options.signal.addEventListener('abort', onAbort, { once: true });
  });
}
