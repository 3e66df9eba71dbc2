import { EventEmitter } from 'events';
import { AutoStepController } from '../autostep/autoStepController';
import { BackendChannel } from '../autostep/backendChannel';
import { CodeClassifier } from '../classify/codeClassifier';
import { errorMessage } from '../errors';
import { WireMessage } from '../framing/messageFramer';
import { LoggerInterface, childLogger, preview } from '../logging';
import { ProtocolDialect, StopCandidate } from '../protocol/dialect';
import { Envelope, ResponseEnvelope } from '../protocol/envelopes';
import { isInternalId } from '../state/normalizeId';
import { SessionState } from '../state/sessionState';

export type ResponseInterceptorState = 'forwarding' | 'filtering' | 'autoStepping';

export interface ResponseInterceptorOptions {
  /** Treat responses shaped like stack traces as such even without a matching request. */
  detectStackTraceByContent: boolean;
}

export declare interface ResponseInterceptor {
  on(event: 'stateChange', listener: (state: ResponseInterceptorState) => void): this;
  emit(event: 'stateChange', state: ResponseInterceptorState): boolean;
}

/**
 * Backend -> client path.
 *
 * Replies to the proxy's own requests are routed the moment they are framed.
 * Everything else goes through one ordered queue, so an auto-step holds back
 * later messages until its replacement has been forwarded.
 */
export class ResponseInterceptor extends EventEmitter {
  private readonly logger: LoggerInterface;
  private current: ResponseInterceptorState = 'forwarding';
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly dialect: ProtocolDialect,
    private readonly session: SessionState,
    private readonly channel: BackendChannel,
    private readonly autoStep: AutoStepController,
    private readonly classifier: CodeClassifier,
    private readonly forward: (bytes: Buffer) => void,
    logger: LoggerInterface,
    private readonly options: ResponseInterceptorOptions = {
      detectStackTraceByContent: false,
    },
  ) {
    super();
    this.logger = childLogger(logger, { component: 'ResponseInterceptor' });
  }

  public get state(): ResponseInterceptorState {
    return this.current;
  }

  /**
   * Takes one framed backend message. Internal replies and captured events
   * are consumed synchronously; the rest is queued in arrival order.
   */
  public accept(message: WireMessage): void {
    const envelope = this.dialect.decode(message);
    if (!envelope) {
      this.session.stats.droppedMessages++;
      this.logger.warn(
        { bytes: message.body.length, body: preview(message.body.toString('utf8')) },
        'Dropping unparseable backend message',
      );
      return;
    }

    if (envelope.kind === 'response' && isInternalId(envelope.id)) {
      this.session.stats.suppressedInternalResponses++;
      const location = this.dialect.stateLocation(envelope);
      if (location) {
        this.session.location.update(location);
      }
      this.channel.deliver(envelope);
      return;
    }
    if (envelope.kind === 'event' && this.channel.offerEvent(envelope)) {
      this.session.stats.suppressedInternalResponses++;
      this.logger.trace({ event: envelope.event }, 'Captured event during auto-step');
      return;
    }

    this.queue = this.queue
      .then(async () => {
        const bytes = await this.process(envelope);
        if (bytes) {
          this.forward(bytes);
        }
      })
      .catch((error: unknown) => {
        this.setState('forwarding');
        this.logger.error(
          { err: error },
          `Failed to process backend message: ${errorMessage(error)}`,
        );
      });
  }

  /** Resolves once every queued message has been handled. */
  public idle(): Promise<void> {
    return this.queue;
  }

  /**
   * @returns the bytes that replace `envelope` on the client side, or
   * undefined when nothing is sent.
   */
  public async process(envelope: Envelope): Promise<Buffer | undefined> {
    switch (envelope.kind) {
      case 'response':
        return this.processResponse(envelope);
      case 'event': {
        const stop = this.dialect.detectStop(
          envelope,
          undefined,
          this.session.lastExecutionVerb,
        );
        return stop ? this.handleStop(stop) : this.passThrough(envelope);
      }
      default:
        return this.passThrough(envelope);
    }
  }

  private async processResponse(response: ResponseEnvelope): Promise<Buffer | undefined> {
    this.session.stats.responses++;
    const record = this.session.correlation.take(response.id);
    if (!record) {
      this.logger.debug({ id: response.id }, 'Response without a recorded request');
    }

    const isStackTrace = record
      ? this.dialect.isStackTraceRecord(record)
      : this.options.detectStackTraceByContent && this.dialect.looksLikeStackTrace(response);
    if (isStackTrace) {
      return this.filterStackTrace(response);
    }

    const stop = this.dialect.detectStop(response, record, this.session.lastExecutionVerb);
    if (stop) {
      return this.handleStop(stop);
    }

    const location = this.dialect.stateLocation(response);
    if (location) {
      this.session.location.update(location);
    }
    return this.passThrough(response);
  }

  /**
   * Drops every frame below the deepest user-code frame. With no user frame
   * at all the response is forwarded untouched.
   */
  private filterStackTrace(response: ResponseEnvelope): Buffer {
    this.setState('filtering');
    try {
      const frames = this.dialect.stackFrames(response);
      if (!frames) {
        return this.passThrough(response);
      }

      let deepestUserFrame = -1;
      for (let i = frames.length - 1; i >= 0; i--) {
        if (this.classifier.isUserCode(frames[i].file)) {
          deepestUserFrame = i;
          break;
        }
      }
      if (deepestUserFrame === -1) {
        this.session.frames.replaceWithIdentity(frames.length);
        this.logger.debug(
          { id: response.id, frames: frames.length },
          'No user frame in stack trace, forwarding unfiltered',
        );
        return this.passThrough(response);
      }

      const keep = deepestUserFrame + 1;
      this.session.frames.replaceWithIdentity(keep);
      if (keep === frames.length) {
        return this.passThrough(response);
      }
      const filtered = this.dialect.truncateStackTrace(response, keep);
      if (filtered === undefined) {
        return this.passThrough(response);
      }
      this.session.stats.filteredStackTraces++;
      this.logger.debug(
        { id: response.id, kept: keep, dropped: frames.length - keep },
        'Filtered stack trace',
      );
      return this.rewritten(response, filtered);
    } finally {
      this.setState('forwarding');
    }
  }

  private async handleStop(stop: StopCandidate): Promise<Buffer | undefined> {
    const location = stop.location ?? (await this.autoStep.locate(stop));
    if (location) {
      this.session.location.update(location);
    }
    if (
      stop.running ||
      stop.exited ||
      !location ||
      !this.classifier.isAdapterCode(location.file)
    ) {
      return this.passThrough(stop.envelope);
    }

    this.setState('autoStepping');
    try {
      const result = await this.autoStep.run(stop);
      return this.rewrittenBytes(stop.envelope, result.replacement);
    } finally {
      this.setState('forwarding');
    }
  }

  private passThrough(envelope: Envelope): Buffer {
    const { prefix, raw } = envelope.message;
    return prefix.length > 0 ? Buffer.concat([prefix, raw]) : raw;
  }

  private rewritten(envelope: Envelope, text: string): Buffer {
    return this.rewrittenBytes(envelope, this.dialect.encode(text));
  }

  private rewrittenBytes(envelope: Envelope, bytes: Buffer): Buffer {
    const { prefix } = envelope.message;
    return prefix.length > 0 ? Buffer.concat([prefix, bytes]) : bytes;
  }

  private setState(state: ResponseInterceptorState): void {
    if (this.current !== state) {
      this.current = state;
      this.emit('stateChange', state);
    }
  }
}
