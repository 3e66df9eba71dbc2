import { WireMessage } from '../framing/messageFramer';
import { LoggerInterface, childLogger, preview } from '../logging';
import { ProtocolDialect } from '../protocol/dialect';
import { RequestEnvelope } from '../protocol/envelopes';
import { SessionState } from '../state/sessionState';

/**
 * Client -> backend path. Records what each request asked for and keeps
 * frame-scoped requests pointed at the right backend frame.
 */
export class RequestInterceptor {
  private readonly logger: LoggerInterface;

  constructor(
    private readonly dialect: ProtocolDialect,
    private readonly session: SessionState,
    logger: LoggerInterface,
  ) {
    this.logger = childLogger(logger, { component: 'RequestInterceptor' });
  }

  /**
   * @returns the bytes to send to the backend, or undefined to drop the message.
   */
  public process(message: WireMessage): Buffer | undefined {
    const envelope = this.dialect.decode(message);
    if (!envelope) {
      this.session.stats.droppedMessages++;
      this.logger.warn(
        { bytes: message.body.length, body: preview(message.body.toString('utf8')) },
        'Dropping unparseable client message',
      );
      return undefined;
    }
    if (envelope.kind !== 'request') {
      return this.passThrough(message);
    }

    this.session.stats.requests++;
    this.session.correlation.record(envelope.id, envelope.method, envelope.subcommand);
    const verb = this.dialect.executionVerb(envelope.method, envelope.subcommand);
    if (verb) {
      this.session.lastExecutionVerb = verb;
    }
    this.logger.trace(
      { id: envelope.id, method: envelope.method, subcommand: envelope.subcommand },
      'Client request',
    );

    return this.rewriteFrame(envelope) ?? this.passThrough(message);
  }

  private rewriteFrame(request: RequestEnvelope): Buffer | undefined {
    const frame = this.dialect.frameIndex(request);
    if (frame === undefined) {
      return undefined;
    }
    const original = this.session.frames.translate(frame);
    if (original === undefined) {
      this.logger.debug(
        { id: request.id, method: request.method, frame },
        'No frame mapping, forwarding untranslated',
      );
      return undefined;
    }
    const rewritten = this.dialect.rewriteFrameIndex(request, original);
    if (rewritten === undefined) {
      return undefined;
    }
    this.session.stats.rewrittenRequests++;
    this.logger.debug(
      { id: request.id, method: request.method, frame, original },
      'Translated frame index',
    );
    return Buffer.concat([request.message.prefix, this.dialect.encode(rewritten)]);
  }

  private passThrough(message: WireMessage): Buffer {
    return message.prefix.length > 0
      ? Buffer.concat([message.prefix, message.raw])
      : message.raw;
  }
}
