import { CorrelatorError, type MalformedFrameError, errorMessage } from '../errors.js';
import { type Logger, logger as defaultLogger } from '../logger.js';
import type { LSPMessage } from '../types.js';
import type { Transport } from './transport.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

interface PendingRequest {
  id: number;
  method: string;
  submittedAt: number;
  timer: NodeJS.Timeout;
  resolve: (value: unknown) => void;
  reject: (reason: CorrelatorError) => void;
}

export type NotificationListener = (method: string, params: unknown) => void;

/**
 * Answers a request initiated by the server. Returning `undefined` means "not
 * handled here" and falls through to the built-in answers.
 */
export type ServerRequestHandler = (method: string, params: unknown) => unknown | undefined;

export interface CorrelatorOptions {
  logger?: Logger;
  workspaceFolders?: Array<{ uri: string; name: string }>;
  onServerRequest?: ServerRequestHandler;
  /** Called once when the inbound sequence ends, fails, or yields a malformed frame. */
  onClose?: (reason: string, malformed?: MalformedFrameError) => void;
}

/**
 * Tracks outstanding requests on one session by id. Responses are matched
 * purely by id, so a slow request never holds up a faster one behind it.
 */
export class Correlator {
  private nextId = 1;
  private readonly pending = new Map<number, PendingRequest>();
  private readonly listeners = new Set<NotificationListener>();
  private readonly log: Logger;
  private closedReason: string | undefined;
  private loop: Promise<void> | undefined;

  constructor(
    private readonly transport: Transport,
    private readonly options: CorrelatorOptions = {}
  ) {
    this.log = options.logger ?? defaultLogger;
  }

  get isClosed(): boolean {
    return this.closedReason !== undefined;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /** Starts draining the transport. Safe to call more than once. */
  start(): Promise<void> {
    this.loop ??= this.run();
    return this.loop;
  }

  call<T = unknown>(
    method: string,
    params: unknown,
    timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS
  ): Promise<T> {
    if (this.closedReason !== undefined) {
      return Promise.reject(
        new CorrelatorError('session_closed', `Session closed: ${this.closedReason}`, method)
      );
    }

    const id = this.nextId++;
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          this.log.debug('correlator', `request ${id} (${method}) timed out after ${timeoutMs}ms`);
          reject(
            new CorrelatorError('timeout', `Request ${method} timed out after ${timeoutMs}ms`, method)
          );
        }
      }, timeoutMs);

      this.pending.set(id, {
        id,
        method,
        submittedAt: Date.now(),
        timer,
        resolve: (value) => resolve(value as T),
        reject,
      });

      this.transport.send({ jsonrpc: '2.0', id, method, params }).catch((error) => {
        this.settle(id, (request) =>
          request.reject(
            new CorrelatorError(
              'session_closed',
              `Failed to send ${method}: ${errorMessage(error)}`,
              method
            )
          )
        );
      });
    });
  }

  notify(method: string, params: unknown): Promise<void> {
    return this.transport.send({ jsonrpc: '2.0', method, params });
  }

  onNotification(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Rejects every pending request with `session_closed`. Idempotent. */
  close(reason: string): void {
    if (this.closedReason !== undefined) return;
    this.closedReason = reason;
    const outstanding = [...this.pending.values()];
    this.pending.clear();
    for (const request of outstanding) {
      clearTimeout(request.timer);
      request.reject(
        new CorrelatorError('session_closed', `Session closed: ${reason}`, request.method)
      );
    }
    if (outstanding.length > 0) {
      this.log.debug('correlator', `closed with ${outstanding.length} pending request(s): ${reason}`);
    }
  }

  handleMessage(message: LSPMessage): void {
    const hasId = message.id !== undefined && message.id !== null;

    if (hasId && message.method === undefined) {
      this.handleResponse(message);
      return;
    }

    if (message.method !== undefined && hasId) {
      this.answerServerRequest(message, message.method);
      return;
    }

    if (message.method !== undefined) {
      for (const listener of this.listeners) {
        try {
          listener(message.method, message.params);
        } catch (error) {
          this.log.error('correlator', `notification listener failed: ${errorMessage(error)}`);
        }
      }
      return;
    }

    this.log.warn('correlator', `dropping message with neither id nor method`);
  }

  private handleResponse(message: LSPMessage): void {
    const id = typeof message.id === 'number' ? message.id : Number(message.id);
    const matched = this.settle(id, (request) => {
      if (message.error) {
        request.reject(
          new CorrelatorError(
            'remote',
            `${request.method} failed: ${message.error.message}`,
            request.method,
            message.error.code
          )
        );
      } else {
        request.resolve(message.result ?? null);
      }
    });
    if (!matched) {
      this.log.warn('correlator', `response for unknown request id ${String(message.id)} ignored`);
    }
  }

  private settle(id: number, action: (request: PendingRequest) => void): boolean {
    const request = this.pending.get(id);
    if (!request) return false;
    this.pending.delete(id);
    clearTimeout(request.timer);
    action(request);
    return true;
  }

  private answerServerRequest(message: LSPMessage, method: string): void {
    const reply = (payload: Pick<LSPMessage, 'result' | 'error'>) => {
      this.transport.send({ jsonrpc: '2.0', id: message.id, ...payload }).catch((error) => {
        this.log.debug('correlator', `could not answer ${method}: ${errorMessage(error)}`);
      });
    };

    const custom = this.options.onServerRequest?.(method, message.params);
    if (custom !== undefined) {
      reply({ result: custom });
      return;
    }

    switch (method) {
      case 'client/registerCapability':
      case 'client/unregisterCapability':
      case 'window/workDoneProgress/create':
      case 'window/showMessageRequest':
        reply({ result: null });
        return;
      case 'workspace/configuration': {
        const params = message.params;
        const items = typeof params === 'object' && params !== null && 'items' in params ? params.items : undefined;
        reply({ result: Array.isArray(items) ? items.map(() => null) : [] });
        return;
      }
      case 'workspace/workspaceFolders':
        reply({ result: this.options.workspaceFolders ?? null });
        return;
      default:
        this.log.debug('correlator', `unhandled server request: ${method}`);
        reply({ error: { code: -32601, message: `Unhandled server request: ${method}` } });
    }
  }

  private async run(): Promise<void> {
    let reason = 'analyzer output stream ended';
    let malformed: MalformedFrameError | undefined;
    try {
      for await (const event of this.transport.messages()) {
        if (event.type === 'malformed') {
          malformed = event.error;
          reason = `malformed frame from analyzer: ${event.error.message}`;
          this.log.error('correlator', reason);
          break;
        }
        this.handleMessage(event.message);
      }
    } catch (error) {
      reason = `analyzer stream failed: ${errorMessage(error)}`;
    }
    this.close(reason);
    this.options.onClose?.(reason, malformed);
  }
}
