import { EventEmitter } from 'events';
import { FramingError } from '../errors';
import { LoggerInterface, childLogger } from '../logging';
import { BackpressurePolicy, DEFAULT_BACKPRESSURE_POLICY } from './backpressurePolicy';
import { BareScanState, BraceScan, extractBareMessage, skipBareObject } from './bareCodec';
import { FramingInvalid, extractFramedMessage } from './framedCodec';
import { WireFormat } from './wireFormat';

/**
 * One complete protocol unit as it appeared on the wire.
 */
export interface WireMessage {
  format: WireFormat;
  /** Inter-message bytes that preceded the message (bare format only). */
  prefix: Buffer;
  /** The exact frame bytes, header included for the framed format. */
  raw: Buffer;
  /** The JSON payload. */
  body: Buffer;
}

const EMPTY = Buffer.alloc(0);

export interface MessageFramerEvents {
  framingError: (error: FramingError) => void;
}

export declare interface MessageFramer {
  on<E extends keyof MessageFramerEvents>(
    event: E,
    listener: MessageFramerEvents[E],
  ): this;
  emit<E extends keyof MessageFramerEvents>(
    event: E,
    ...args: Parameters<MessageFramerEvents[E]>
  ): boolean;
}

/**
 * Reassembles messages from a byte stream. One instance per direction;
 * incomplete data stays buffered between pushes.
 */
export class MessageFramer extends EventEmitter {
  private readonly logger: LoggerInterface;
  private readonly policy: BackpressurePolicy;
  private buffer: Buffer = EMPTY;
  private bareState: BareScanState | undefined;
  private bareSkip: BraceScan | undefined;
  private consecutiveFramingErrors = 0;
  private backlogged = false;

  constructor(
    public readonly format: WireFormat,
    logger: LoggerInterface,
    policy: Partial<BackpressurePolicy> = {},
  ) {
    super();
    this.logger = childLogger(logger, { component: 'MessageFramer', format });
    this.policy = { ...DEFAULT_BACKPRESSURE_POLICY, ...policy };
  }

  public get bufferedBytes(): number {
    return this.buffer.length;
  }

  /** True when the last push stopped at the batch limit with data left to frame. */
  public get hasBacklog(): boolean {
    return this.backlogged;
  }

  /**
   * Appends `chunk` and returns the messages it completed, in arrival order.
   * At most `maxMessagesPerPush` extraction steps run per call; the rest
   * stays buffered for `drain()`.
   */
  public push(chunk: Buffer): WireMessage[] {
    if (chunk.length > 0) {
      this.buffer =
        this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    }
    const messages: WireMessage[] = [];
    this.backlogged = false;

    let iterations = 0;
    while (this.buffer.length > 0) {
      if (iterations >= this.policy.maxMessagesPerPush) {
        this.backlogged = true;
        this.logger.trace(
          { extracted: messages.length, bufferedBytes: this.buffer.length },
          'Batch limit reached, deferring the rest',
        );
        break;
      }
      iterations++;
      const progressed =
        this.format === 'framed'
          ? this.nextFramed(messages)
          : this.nextBare(messages);
      if (!progressed) {
        break;
      }
    }

    if (!this.backlogged && this.buffer.length > this.policy.maxBufferedBytes) {
      this.discard(
        `Buffered ${this.buffer.length} bytes exceeds maximum ${this.policy.maxBufferedBytes}`,
      );
    }
    return messages;
  }

  /** Continues framing already buffered data. */
  public drain(): WireMessage[] {
    return this.push(EMPTY);
  }

  public reset(): void {
    this.buffer = EMPTY;
    this.backlogged = false;
    this.bareState = undefined;
    this.bareSkip = undefined;
    this.consecutiveFramingErrors = 0;
  }

  private nextFramed(messages: WireMessage[]): boolean {
    const result = extractFramedMessage(this.buffer, this.policy);
    if (result.kind === 'incomplete') {
      return false;
    }
    if (result.kind === 'invalid') {
      return this.skipInvalid(result);
    }

    if (result.headerStart > 0) {
      const noise = this.buffer.toString('latin1', 0, result.headerStart);
      if (noise.trim().length > 0) {
        this.logger.debug(
          { bytes: result.headerStart },
          'Discarding bytes before frame header',
        );
      }
    }
    if (result.trailingPartialOffset !== undefined) {
      this.logger.trace(
        {
          trailingCompleteBytes: result.trailingCompleteBytes,
          trailingPartialOffset: result.trailingPartialOffset,
        },
        'Frame followed by partial data',
      );
    }
    messages.push({
      format: 'framed',
      prefix: EMPTY,
      raw: this.buffer.subarray(result.headerStart, result.frameEnd),
      body: result.body,
    });
    this.buffer = this.buffer.subarray(result.frameEnd);
    this.consecutiveFramingErrors = 0;
    return true;
  }

  private nextBare(messages: WireMessage[]): boolean {
    if (this.bareSkip) {
      return this.skipOversized(this.bareSkip);
    }
    const result = extractBareMessage(this.buffer, this.policy, this.bareState);
    if (result.kind === 'incomplete') {
      this.bareState = result.state;
      return false;
    }
    this.bareState = undefined;
    if (result.kind === 'invalid') {
      this.bareSkip = result.skip;
      return this.skipInvalid(result);
    }
    const raw = this.buffer.subarray(result.start, result.end);
    messages.push({
      format: 'bare',
      prefix: this.buffer.subarray(0, result.start),
      raw,
      body: raw,
    });
    this.buffer = this.buffer.subarray(result.end);
    this.consecutiveFramingErrors = 0;
    return true;
  }

  /** Drops the remainder of an oversized object, across pushes if need be. */
  private skipOversized(skip: BraceScan): boolean {
    const result = skipBareObject(this.buffer, skip);
    if (result.kind === 'skipping') {
      this.bareSkip = result.scan;
      this.buffer = EMPTY;
      return false;
    }
    this.logger.debug({ bytes: result.end }, 'Skipped the end of an oversized object');
    this.bareSkip = undefined;
    this.buffer = this.buffer.subarray(result.end);
    return true;
  }

  private skipInvalid(invalid: FramingInvalid): boolean {
    this.buffer = this.buffer.subarray(invalid.skipTo);
    this.report(new FramingError(invalid.detail, invalid.reason, invalid.skipTo));
    this.consecutiveFramingErrors++;
    if (
      this.consecutiveFramingErrors > this.policy.maxConsecutiveFramingErrors
    ) {
      this.logger.error(
        { consecutive: this.consecutiveFramingErrors },
        'Too many consecutive framing errors, dropping buffered data',
      );
      this.reset();
      return false;
    }
    return true;
  }

  private discard(detail: string): void {
    const discarded = this.buffer.length;
    this.reset();
    this.report(new FramingError(detail, 'buffer-overflow', discarded));
  }

  private report(error: FramingError): void {
    this.logger.warn(
      { reason: error.reason, discardedBytes: error.discardedBytes },
      error.message,
    );
    this.emit('framingError', error);
  }
}
