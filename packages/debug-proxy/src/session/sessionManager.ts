import { EventEmitter } from 'events';
import * as net from 'net';
import { CodeClassifier } from '../classify/codeClassifier';
import { ProxyConfig } from '../config/proxyConfig';
import { errorMessage, isConnectionClosedError } from '../errors';
import { WireFormat, detectWireFormat } from '../framing/wireFormat';
import { LoggerInterface, childLogger } from '../logging';
import { connectTcp, dialWithRetry } from './backendDialer';
import { ProxySession, SessionEndPayload } from './proxySession';

export interface SessionManagerEvents {
  sessionStarted: (session: ProxySession) => void;
  sessionEnded: (payload: SessionEndPayload) => void;
  sessionRejected: (error: Error) => void;
}

export declare interface SessionManager {
  on<E extends keyof SessionManagerEvents>(event: E, listener: SessionManagerEvents[E]): this;
  once<E extends keyof SessionManagerEvents>(event: E, listener: SessionManagerEvents[E]): this;
  emit<E extends keyof SessionManagerEvents>(
    event: E,
    ...args: Parameters<SessionManagerEvents[E]>
  ): boolean;
}

/**
 * Accepts IDE connections and runs one {@link ProxySession} per connection.
 * Sessions are independent; a client may reconnect after its session ends.
 */
export class SessionManager extends EventEmitter {
  private readonly logger: LoggerInterface;
  private readonly sessions = new Map<string, ProxySession>();
  private server: net.Server | undefined;
  private nextSessionId = 1;

  constructor(
    private readonly config: ProxyConfig,
    private readonly classifier: CodeClassifier,
    logger: LoggerInterface,
    private readonly connectBackend: () => Promise<net.Socket> = () =>
      connectTcp(config.backendHost, config.backendPort, config.connectTimeoutMs),
  ) {
    super();
    this.logger = childLogger(logger, { component: 'SessionManager' });
  }

  public get activeSessionCount(): number {
    return this.sessions.size;
  }

  public listen(): Promise<net.AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error('SessionManager is already listening'));
    }
    const server = net.createServer((socket) => this.handleConnection(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        this.server = undefined;
        reject(error);
      };
      server.once('error', onError);
      server.listen(this.config.listenPort, this.config.listenHost, () => {
        server.removeListener('error', onError);
        server.on('error', (error: Error) =>
          this.logger.error({ err: error }, `Listener error: ${error.message}`),
        );
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Unexpected listener address: ${String(address)}`));
          return;
        }
        this.logger.info(
          { host: address.address, port: address.port },
          'Debug proxy listening',
        );
        resolve(address);
      });
    });
  }

  /**
   * Stops accepting connections and ends every active session.
   */
  public async close(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    this.logger.info(`Closing ${this.sessions.size} active sessions`);
    for (const session of Array.from(this.sessions.values())) {
      session.close('proxy shutting down');
    }
    if (!server) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private handleConnection(client: net.Socket): void {
    const remote = `${client.remoteAddress ?? '?'}:${client.remotePort ?? '?'}`;
    this.logger.info({ remote }, 'Client connected');

    const received: Buffer[] = [];
    let receivedBytes = 0;
    const onData = (chunk: Buffer) => {
      received.push(chunk);
      receivedBytes += chunk.length;
      const initial = Buffer.concat(received);
      const format = detectWireFormat(initial);
      if (!format) {
        const limit = this.config.backpressure.maxBufferedBytes;
        if (receivedBytes > limit) {
          detach();
          this.logger.warn(
            { remote, bytes: receivedBytes, limit },
            'Client sent no protocol data within the buffer limit, closing',
          );
          client.destroy();
        }
        return;
      }
      detach();
      client.pause();
      this.openSession(client, format, initial, remote).catch((error: unknown) => {
        this.logger.error({ err: error, remote }, `Session setup failed: ${errorMessage(error)}`);
        client.destroy();
      });
    };
    const onError = (error: Error) => {
      detach();
      if (isConnectionClosedError(error)) {
        this.logger.info({ remote }, 'Client left before sending data');
      } else {
        this.logger.warn({ err: error, remote }, `Client error before session start: ${error.message}`);
      }
      client.destroy();
    };
    const detach = () => {
      client.removeListener('data', onData);
      client.removeListener('error', onError);
    };
    client.on('data', onData);
    client.on('error', onError);
  }

  private async openSession(
    client: net.Socket,
    format: WireFormat,
    initial: Buffer,
    remote: string,
  ): Promise<void> {
    // Held until the backend is up so an early disconnect is noticed.
    const clientErrors: Error[] = [];
    const holdError = (error: Error) => clientErrors.push(error);
    client.on('error', holdError);

    const address = `${this.config.backendHost}:${this.config.backendPort}`;
    let backend: net.Socket;
    try {
      backend = await dialWithRetry(
        this.connectBackend,
        {
          retries: this.config.dialRetries,
          delayMs: this.config.dialDelayMs,
          address,
        },
        this.logger,
      );
    } catch (error) {
      client.removeListener('error', holdError);
      this.emit('sessionRejected', error instanceof Error ? error : new Error(String(error)));
      this.logger.error(
        { remote, address, err: error },
        `Closing client, backend unreachable: ${errorMessage(error)}`,
      );
      client.destroy();
      return;
    }
    client.removeListener('error', holdError);

    if (client.destroyed || clientErrors.length > 0) {
      this.logger.info({ remote }, 'Client went away while connecting to backend');
      backend.destroy();
      client.destroy();
      return;
    }

    const sessionId = `session-${this.nextSessionId++}`;
    const session = new ProxySession(
      sessionId,
      format,
      client,
      backend,
      this.classifier,
      this.config,
      this.logger,
    );
    this.sessions.set(sessionId, session);
    session.on('closed', (payload) => {
      this.sessions.delete(sessionId);
      this.logger.info(`Total active sessions: ${this.sessions.size}.`);
      this.emit('sessionEnded', payload);
    });

    session.start(initial);
    client.resume();
    this.emit('sessionStarted', session);
  }
}
