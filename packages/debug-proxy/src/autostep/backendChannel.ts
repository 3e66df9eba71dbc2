import { InternalRequestError, errorMessage } from '../errors';
import { LoggerInterface, childLogger } from '../logging';
import { ProtocolDialect } from '../protocol/dialect';
import { EventEnvelope, ResponseEnvelope } from '../protocol/envelopes';
import { INTERNAL_ID_MAX, INTERNAL_ID_MIN } from '../state/normalizeId';

interface PendingRequest {
  resolve: (response: ResponseEnvelope) => void;
  reject: (error: InternalRequestError) => void;
  method: string;
  timeoutTimer?: NodeJS.Timeout;
}

interface EventWaiter {
  event: string;
  resolve: (event: EventEnvelope) => void;
  reject: (error: InternalRequestError) => void;
  timeoutTimer: NodeJS.Timeout;
}

/** Events held back from the client while an auto-step owns the backend. */
const CAPTURED_EVENTS: ReadonlySet<string> = new Set(['stopped', 'continued']);

/**
 * Sends the proxy's own requests over a session's backend socket.
 *
 * Replies are handed over by the response path as soon as they are framed,
 * never through the ordered forwarding queue, so an auto-step that is
 * blocking that queue still receives them.
 */
export class BackendChannel {
  public static readonly DEFAULT_TIMEOUT = 10000; // 10 seconds

  private readonly logger: LoggerInterface;
  private nextId = INTERNAL_ID_MIN;
  private readonly pending = new Map<string, PendingRequest>();
  private closed = false;
  private capturing = false;
  private captured: EventEnvelope[] = [];
  private waiter: EventWaiter | undefined;

  constructor(
    private readonly dialect: ProtocolDialect,
    private readonly write: (bytes: Buffer) => void,
    logger: LoggerInterface,
    private readonly timeoutMs: number = BackendChannel.DEFAULT_TIMEOUT,
  ) {
    this.logger = childLogger(logger, { component: 'BackendChannel' });
  }

  public get pendingCount(): number {
    return this.pending.size;
  }

  public get isCapturing(): boolean {
    return this.capturing;
  }

  public request(
    method: string,
    args: unknown,
    timeoutMs: number = this.timeoutMs,
  ): Promise<ResponseEnvelope> {
    const id = this.allocateId();
    const key = String(id);
    if (this.closed) {
      return Promise.reject(
        new InternalRequestError(
          `Cannot send ${method}: backend channel closed`,
          'closed',
          key,
          method,
        ),
      );
    }

    return new Promise<ResponseEnvelope>((resolve, reject) => {
      const pendingRequest: PendingRequest = { resolve, reject, method };
      if (timeoutMs > 0) {
        pendingRequest.timeoutTimer = setTimeout(() => {
          this.pending.delete(key);
          const timeoutError = new InternalRequestError(
            `Internal request ${method} (id: ${key}) timed out after ${timeoutMs}ms`,
            'timeout',
            key,
            method,
          );
          this.logger.warn({ method, id: key, timeoutMs }, timeoutError.message);
          reject(timeoutError);
        }, timeoutMs);
      }
      this.pending.set(key, pendingRequest);

      const text = this.dialect.buildRequest(id, method, args);
      this.logger.debug({ method, id: key }, 'Sending internal request');
      try {
        this.write(this.dialect.encode(text));
      } catch (error) {
        this.rejectPending(
          key,
          new InternalRequestError(
            `Failed to write ${method}: ${errorMessage(error)}`,
            'closed',
            key,
            method,
          ),
        );
      }
    });
  }

  /**
   * Resolves the internal request `response` answers.
   * @returns false when no request with that id is outstanding.
   */
  public deliver(response: ResponseEnvelope): boolean {
    const pending = this.pending.get(response.id);
    if (!pending) {
      this.logger.debug({ id: response.id }, 'Reply for unknown internal request');
      return false;
    }
    this.pending.delete(response.id);
    if (pending.timeoutTimer) {
      clearTimeout(pending.timeoutTimer);
    }
    if (response.success) {
      pending.resolve(response);
    } else {
      pending.reject(
        new InternalRequestError(
          `Backend rejected ${pending.method} (id: ${response.id})`,
          'backend-error',
          response.id,
          pending.method,
          response.value,
        ),
      );
    }
    return true;
  }

  public beginCapture(): void {
    this.capturing = true;
    this.captured = [];
  }

  public endCapture(): void {
    this.capturing = false;
    this.captured = [];
    this.clearWaiter();
  }

  /**
   * Takes `event` away from the client while a capture is active.
   * @returns true when the event was captured.
   */
  public offerEvent(event: EventEnvelope): boolean {
    if (!this.capturing || !CAPTURED_EVENTS.has(event.event)) {
      return false;
    }
    if (this.waiter && this.waiter.event === event.event) {
      const waiter = this.waiter;
      this.clearWaiter();
      waiter.resolve(event);
    } else if (event.event === 'stopped') {
      this.captured.push(event);
    }
    return true;
  }

  /** Next captured event named `name`, including one that already arrived. */
  public waitForEvent(
    name: string,
    timeoutMs: number = this.timeoutMs,
  ): Promise<EventEnvelope> {
    const index = this.captured.findIndex((e) => e.event === name);
    if (index !== -1) {
      const [event] = this.captured.splice(index, 1);
      return Promise.resolve(event);
    }
    if (this.closed) {
      return Promise.reject(
        new InternalRequestError(
          `Cannot wait for ${name}: backend channel closed`,
          'closed',
          '',
          name,
        ),
      );
    }
    this.clearWaiter();
    return new Promise<EventEnvelope>((resolve, reject) => {
      const timeoutTimer = setTimeout(() => {
        this.waiter = undefined;
        reject(
          new InternalRequestError(
            `Timed out after ${timeoutMs}ms waiting for ${name} event`,
            'timeout',
            '',
            name,
          ),
        );
      }, timeoutMs);
      this.waiter = { event: name, resolve, reject, timeoutTimer };
    });
  }

  /**
   * Rejects everything outstanding. Further requests fail immediately.
   */
  public close(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const [key, pending] of Array.from(this.pending.entries())) {
      this.rejectPending(
        key,
        new InternalRequestError(
          `Disconnected: ${reason}. Internal request ${pending.method} (id: ${key}) aborted.`,
          'closed',
          key,
          pending.method,
        ),
      );
    }
    if (this.waiter) {
      const waiter = this.waiter;
      this.clearWaiter();
      waiter.reject(
        new InternalRequestError(
          `Disconnected: ${reason}. Stopped waiting for ${waiter.event}.`,
          'closed',
          '',
          waiter.event,
        ),
      );
    }
    this.capturing = false;
  }

  private allocateId(): number {
    // Rolls over within the reserved range, skipping ids still in flight.
    const span = INTERNAL_ID_MAX - INTERNAL_ID_MIN + 1;
    for (let attempt = 0; attempt < span; attempt++) {
      const id = this.nextId;
      this.nextId = id >= INTERNAL_ID_MAX ? INTERNAL_ID_MIN : id + 1;
      if (!this.pending.has(String(id))) {
        return id;
      }
    }
    return this.nextId;
  }

  private rejectPending(key: string, error: InternalRequestError): void {
    const pending = this.pending.get(key);
    if (pending) {
      if (pending.timeoutTimer) clearTimeout(pending.timeoutTimer);
      this.pending.delete(key);
      pending.reject(error);
    }
  }

  private clearWaiter(): void {
    if (this.waiter) {
      clearTimeout(this.waiter.timeoutTimer);
      this.waiter = undefined;
    }
  }
}
