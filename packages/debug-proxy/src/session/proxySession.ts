import { EventEmitter } from 'events';
import * as net from 'net';
import { AutoStepController } from '../autostep/autoStepController';
import { BackendChannel } from '../autostep/backendChannel';
import { DapAutoStepController } from '../autostep/dapAutoStepController';
import { JsonRpcAutoStepController } from '../autostep/jsonRpcAutoStepController';
import { CodeClassifier } from '../classify/codeClassifier';
import { ProxyConfig } from '../config/proxyConfig';
import { errorMessage, isConnectionClosedError } from '../errors';
import { MessageFramer } from '../framing/messageFramer';
import { WireFormat } from '../framing/wireFormat';
import { RequestInterceptor } from '../interceptors/requestInterceptor';
import {
  ResponseInterceptor,
  ResponseInterceptorState,
} from '../interceptors/responseInterceptor';
import { LoggerInterface, childLogger } from '../logging';
import { DapDialect } from '../protocol/dapDialect';
import { ProtocolDialect } from '../protocol/dialect';
import { JsonRpcDialect } from '../protocol/jsonRpcDialect';
import { SessionState, SessionStats } from '../state/sessionState';

export type ProxySessionOptions = Pick<
  ProxyConfig,
  | 'sessionTimeoutMs'
  | 'keepAliveMs'
  | 'backpressure'
  | 'autoStep'
  | 'detectStackTraceByContent'
>;

export interface SessionEndPayload {
  sessionId: string;
  reason: string;
  stats: SessionStats;
}

export declare interface ProxySession {
  on(event: 'closed', listener: (payload: SessionEndPayload) => void): this;
  emit(event: 'closed', payload: SessionEndPayload): boolean;
}

const EMPTY = Buffer.alloc(0);

interface ProtocolStack {
  dialect: ProtocolDialect;
  autoStep: AutoStepController;
}

/**
 * One client connection bridged to one backend connection.
 */
export class ProxySession extends EventEmitter {
  public readonly state: SessionState;
  public readonly channel: BackendChannel;
  public readonly requests: RequestInterceptor;
  public readonly responses: ResponseInterceptor;

  private readonly logger: LoggerInterface;
  private readonly clientFramer: MessageFramer;
  private readonly backendFramer: MessageFramer;
  private readonly paused = { client: false, backend: false };
  private readonly drainScheduled = { client: false, backend: false };
  private sessionTimer: NodeJS.Timeout | undefined;
  private closed = false;

  constructor(
    public readonly sessionId: string,
    public readonly format: WireFormat,
    private readonly client: net.Socket,
    private readonly backend: net.Socket,
    classifier: CodeClassifier,
    private readonly options: ProxySessionOptions,
    logger: LoggerInterface,
  ) {
    super();
    this.logger = childLogger(logger, { component: 'ProxySession', sessionId, format });
    this.state = new SessionState(sessionId);

    const dialect: ProtocolDialect =
      format === 'framed' ? new DapDialect() : new JsonRpcDialect(classifier);
    this.channel = new BackendChannel(
      dialect,
      (bytes) => this.write(this.backend, bytes, 'backend'),
      this.logger,
      options.autoStep.requestTimeoutMs,
    );
    const stack = this.createStack(dialect, classifier);

    this.requests = new RequestInterceptor(stack.dialect, this.state, this.logger);
    this.responses = new ResponseInterceptor(
      stack.dialect,
      this.state,
      this.channel,
      stack.autoStep,
      classifier,
      (bytes) => this.write(this.client, bytes, 'client'),
      this.logger,
      { detectStackTraceByContent: options.detectStackTraceByContent },
    );
    this.responses.on('stateChange', (state: ResponseInterceptorState) =>
      this.logger.trace({ state }, 'Response path state'),
    );

    this.clientFramer = new MessageFramer(format, this.logger, options.backpressure);
    this.backendFramer = new MessageFramer(format, this.logger, options.backpressure);
    for (const framer of [this.clientFramer, this.backendFramer]) {
      framer.on('framingError', () => {
        this.state.stats.droppedMessages++;
      });
    }
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Starts both forwarding directions. `initialClientData` holds bytes read
   * from the client before the session existed (wire format detection).
   */
  public start(initialClientData?: Buffer): void {
    for (const socket of [this.client, this.backend]) {
      socket.setKeepAlive(true, this.options.keepAliveMs);
      socket.setTimeout(0);
      socket.setNoDelay(true);
    }

    this.client.on('data', (chunk: Buffer) => this.onClientData(chunk));
    this.backend.on('data', (chunk: Buffer) => this.onBackendData(chunk));
    this.client.on('error', (error: Error) => this.onSocketError('client', error));
    this.backend.on('error', (error: Error) => this.onSocketError('backend', error));
    this.client.on('close', () => this.close('client disconnected'));
    this.backend.on('close', () => this.close('backend disconnected'));

    if (this.options.sessionTimeoutMs > 0) {
      this.sessionTimer = setTimeout(
        () => this.close('session timeout'),
        this.options.sessionTimeoutMs,
      );
      this.sessionTimer.unref();
    }

    this.logger.info('Session started');
    if (initialClientData && initialClientData.length > 0) {
      this.onClientData(initialClientData);
    }
  }

  /**
   * Ends the session: pending internal requests fail, both sockets are
   * destroyed and the statistics are logged.
   */
  public close(reason: string): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.sessionTimer) {
      clearTimeout(this.sessionTimer);
      this.sessionTimer = undefined;
    }
    this.channel.close(reason);
    this.client.destroy();
    this.backend.destroy();
    this.clientFramer.reset();
    this.backendFramer.reset();

    const stats = { ...this.state.stats };
    this.logger.info(
      { reason, stats, pendingRequests: this.state.correlation.size },
      'Session ended',
    );
    this.state.correlation.clear();
    this.emit('closed', { sessionId: this.sessionId, reason, stats });
  }

  private createStack(dialect: ProtocolDialect, classifier: CodeClassifier): ProtocolStack {
    if (dialect instanceof DapDialect) {
      return {
        dialect,
        autoStep: new DapAutoStepController(
          dialect,
          this.channel,
          classifier,
          this.state,
          this.logger,
          this.options.autoStep,
        ),
      };
    }
    if (dialect instanceof JsonRpcDialect) {
      return {
        dialect,
        autoStep: new JsonRpcAutoStepController(
          dialect,
          this.channel,
          classifier,
          this.state,
          this.logger,
          this.options.autoStep,
        ),
      };
    }
    throw new Error(`Unsupported dialect: ${dialect.name}`);
  }

  private onClientData(chunk: Buffer): void {
    if (this.closed) {
      return;
    }
    for (const message of this.clientFramer.push(chunk)) {
      const bytes = this.requests.process(message);
      if (bytes) {
        this.write(this.backend, bytes, 'backend');
      }
    }
    this.scheduleDrain('client');
  }

  private onBackendData(chunk: Buffer): void {
    if (this.closed) {
      return;
    }
    for (const message of this.backendFramer.push(chunk)) {
      this.responses.accept(message);
    }
    this.scheduleDrain('backend');
  }

  /** Frames what a capped push left buffered on the next tick. */
  private scheduleDrain(leg: 'client' | 'backend'): void {
    const framer = leg === 'client' ? this.clientFramer : this.backendFramer;
    if (!framer.hasBacklog || this.drainScheduled[leg]) {
      return;
    }
    this.drainScheduled[leg] = true;
    setImmediate(() => {
      this.drainScheduled[leg] = false;
      if (leg === 'client') {
        this.onClientData(EMPTY);
      } else {
        this.onBackendData(EMPTY);
      }
    });
  }

  /**
   * Writes to one leg. When that leg's buffer is full, the opposite leg is
   * paused until it drains.
   */
  private write(target: net.Socket, bytes: Buffer, leg: 'client' | 'backend'): void {
    if (this.closed || target.destroyed || !target.writable) {
      this.logger.debug({ leg, bytes: bytes.length }, 'Dropping write to closed socket');
      return;
    }
    const flushed = target.write(bytes);
    if (flushed) {
      return;
    }
    const source = leg === 'client' ? this.backend : this.client;
    const sourceLeg = leg === 'client' ? 'backend' : 'client';
    if (this.paused[sourceLeg]) {
      return;
    }
    this.paused[sourceLeg] = true;
    source.pause();
    this.logger.trace({ leg }, 'Write buffer full, pausing source');
    target.once('drain', () => {
      this.paused[sourceLeg] = false;
      if (!this.closed) {
        source.resume();
      }
    });
  }

  private onSocketError(leg: 'client' | 'backend', error: Error): void {
    if (isConnectionClosedError(error)) {
      this.logger.info({ leg }, `Connection closed: ${errorMessage(error)}`);
    } else {
      this.logger.error({ leg, err: error }, `Socket error: ${errorMessage(error)}`);
    }
    this.close(`${leg} error: ${errorMessage(error)}`);
  }
}
