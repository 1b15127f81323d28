import type { Readable, Writable } from 'node:stream';
import { MalformedFrameError, TransportError, errorMessage } from '../errors.js';
import { type Logger, logger as defaultLogger } from '../logger.js';
import type { LSPMessage } from '../types.js';

const HEADER_SEPARATOR = Buffer.from('\r\n\r\n', 'ascii');
// A header block this large without a separator is garbage, not a slow writer.
const MAX_HEADER_BYTES = 8 * 1024;

export type InboundEvent =
  | { type: 'message'; message: LSPMessage }
  | { type: 'malformed'; error: MalformedFrameError };

export function encodeFrame(message: LSPMessage): Buffer {
  const body = Buffer.from(JSON.stringify(message), 'utf8');
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'ascii');
  return Buffer.concat([header, body]);
}

function isMessage(value: unknown): value is LSPMessage {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Incremental decoder for `Content-Length` framed JSON-RPC. Content-Length is a
 * byte count, so the buffer is kept as raw bytes until a full body is present.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): InboundEvent[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const events: InboundEvent[] = [];

    while (this.buffer.length > 0) {
      const headerEnd = this.buffer.indexOf(HEADER_SEPARATOR);
      if (headerEnd === -1) {
        if (this.buffer.length > MAX_HEADER_BYTES) {
          const raw = this.buffer.subarray(0, 200).toString('utf8');
          this.buffer = Buffer.alloc(0);
          events.push({
            type: 'malformed',
            error: new MalformedFrameError('Header block exceeds 8 KiB without terminator', raw),
          });
        }
        break;
      }

      const header = this.buffer.subarray(0, headerEnd).toString('ascii');
      const bodyStart = headerEnd + HEADER_SEPARATOR.length;
      const lengthMatch = header.match(/content-length:\s*(\d+)/i);

      if (!lengthMatch?.[1]) {
        this.buffer = this.buffer.subarray(bodyStart);
        events.push({
          type: 'malformed',
          error: new MalformedFrameError('Frame header has no Content-Length', header),
        });
        continue;
      }

      const contentLength = Number.parseInt(lengthMatch[1], 10);
      if (this.buffer.length < bodyStart + contentLength) break;

      const body = this.buffer.subarray(bodyStart, bodyStart + contentLength).toString('utf8');
      this.buffer = this.buffer.subarray(bodyStart + contentLength);

      let parsed: unknown;
      try {
        parsed = JSON.parse(body);
      } catch (error) {
        events.push({
          type: 'malformed',
          error: new MalformedFrameError(`Frame body is not JSON: ${errorMessage(error)}`, body, {
            cause: error,
          }),
        });
        continue;
      }

      if (!isMessage(parsed)) {
        events.push({
          type: 'malformed',
          error: new MalformedFrameError('Frame body is not a JSON-RPC object', body),
        });
        continue;
      }

      events.push({ type: 'message', message: parsed });
    }

    return events;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }
}

/**
 * Framed duplex channel over a process's stdio. Outbound writes are chained so
 * they reach the wire in submission order; inbound messages are exposed as a
 * single-use async sequence that ends when the input stream closes.
 */
export class Transport {
  private writeChain: Promise<void> = Promise.resolve();
  private consumed = false;
  private inputClosed = false;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    private readonly log: Logger = defaultLogger
  ) {}

  get closed(): boolean {
    return this.inputClosed || this.output.destroyed || this.output.writableEnded;
  }

  send(message: LSPMessage): Promise<void> {
    const frame = encodeFrame(message);
    const next = this.writeChain.then(() => this.write(frame));
    this.writeChain = next.catch((error) => {
      this.log.debug('transport', `write failed: ${errorMessage(error)}`);
    });
    return next;
  }

  async *messages(): AsyncGenerator<InboundEvent, void, undefined> {
    if (this.consumed) {
      throw new TransportError(
        'transport_closed',
        'Inbound message sequence was already consumed; a new session needs a new Transport'
      );
    }
    this.consumed = true;

    const decoder = new FrameDecoder();
    try {
      for await (const chunk of this.input) {
        const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8');
        yield* decoder.push(bytes);
      }
      if (decoder.pendingBytes > 0) {
        this.log.debug('transport', `stream ended with ${decoder.pendingBytes} undecoded bytes`);
      }
    } finally {
      this.inputClosed = true;
    }
  }

  private write(frame: Buffer): Promise<void> {
    if (this.output.destroyed || this.output.writableEnded) {
      return Promise.reject(
        new TransportError('transport_closed', 'Cannot send: analyzer input stream is closed')
      );
    }
    return new Promise((resolve, reject) => {
      this.output.write(frame, (error) => {
        if (error) {
          reject(
            new TransportError('transport_closed', `Write to analyzer failed: ${error.message}`, {
              cause: error,
            })
          );
        } else {
          resolve();
        }
      });
    });
  }
}
