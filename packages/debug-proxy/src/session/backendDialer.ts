import * as net from 'net';
import { setTimeout as delay } from 'timers/promises';
import { BackendUnreachableError, errorMessage } from '../errors';
import { LoggerInterface } from '../logging';

export interface DialOptions {
  /** Total connection attempts. */
  retries: number;
  /** Fixed wait between attempts. */
  delayMs: number;
  /** Shown in logs and errors. */
  address: string;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 10000;

/**
 * Opens a TCP connection, failing after `timeoutMs` without an answer.
 */
export function connectTcp(
  host: string,
  port: number,
  timeoutMs: number = DEFAULT_CONNECT_TIMEOUT_MS,
): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (error: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(error);
    };
    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      resolve(socket);
    });
  });
}

/**
 * Calls `connect` up to `options.retries` times with `options.delayMs`
 * between failures.
 */
export async function dialWithRetry<T>(
  connect: () => Promise<T>,
  options: DialOptions,
  logger: LoggerInterface,
): Promise<T> {
  const attempts = Math.max(1, options.retries);
  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const connection = await connect();
      if (attempt > 1) {
        logger.info({ address: options.address, attempt }, 'Connected to backend');
      }
      return connection;
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      logger.warn(
        { address: options.address, attempt, attempts },
        `Backend connection attempt failed: ${errorMessage(error)}`,
      );
      if (attempt < attempts) {
        await delay(options.delayMs);
      }
    }
  }

  throw new BackendUnreachableError(
    `Failed to connect to ${options.address} after ${attempts} attempts: ${lastError?.message ?? 'unknown error'}`,
    options.address,
    attempts,
    lastError,
  );
}
