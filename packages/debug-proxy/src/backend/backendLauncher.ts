import * as child_process from 'child_process';
import * as readline from 'readline';
import { BackendProcessError, BackendProcessStage } from '../errors';
import { LanguageBackendConfig, LanguageProfile } from '../config/languageProfile';
import { LoggerInterface, childLogger } from '../logging';

export interface LaunchOptions {
  /** Backend listen port, substituted for `${port}`. */
  port: number;
  /** Debuggee, substituted for `${program}`; arguments that need it are dropped when absent. */
  program?: string;
  /** How long the process must stay up to count as started. */
  startupGraceMs?: number;
}

const DEFAULT_STARTUP_GRACE_MS = 500;

/**
 * Expands `${port}` and `${program}` in the configured arguments.
 */
export function expandBackendArgs(
  config: LanguageBackendConfig,
  options: Pick<LaunchOptions, 'port' | 'program'>,
): string[] {
  const args: string[] = [];
  for (const arg of config.args ?? []) {
    if (arg.includes('${program}') && options.program === undefined) {
      continue;
    }
    args.push(
      arg
        .split('${port}')
        .join(String(options.port))
        .split('${program}')
        .join(options.program ?? ''),
    );
  }
  return args;
}

/**
 * Starts and owns the native debugger backend for `--start`.
 */
export class BackendLauncher {
  private readonly logger: LoggerInterface;
  private process: child_process.ChildProcess | undefined;

  constructor(logger: LoggerInterface) {
    this.logger = childLogger(logger, { component: 'BackendLauncher' });
  }

  public get pid(): number | undefined {
    return this.process?.pid;
  }

  /**
   * Spawns the profile's backend and resolves once it has survived the
   * startup grace period.
   * @throws BackendProcessError when it cannot be spawned or exits early.
   */
  public launch(
    profile: LanguageProfile,
    options: LaunchOptions,
  ): Promise<child_process.ChildProcess> {
    const backendConfig = profile.backend;
    if (!backendConfig) {
      return Promise.reject(
        new Error(`Language profile '${profile.language}' has no backend command`),
      );
    }
    if (this.process) {
      return Promise.reject(new Error('A backend process is already running'));
    }

    const args = expandBackendArgs(backendConfig, options);
    const errMsgPrefix = `Failed to start ${profile.language} backend. Command: ${backendConfig.command}`;
    const graceMs = options.startupGraceMs ?? DEFAULT_STARTUP_GRACE_MS;

    return new Promise((resolve, reject) => {
      let stderrOutput = '';
      let settled = false;
      let graceTimer: NodeJS.Timeout | undefined;

      const fail = (stage: BackendProcessStage, detail: string, extra: {
        cause?: Error;
        exitCode?: number;
        signal?: string;
      } = {}) => {
        if (settled) return;
        settled = true;
        if (graceTimer) clearTimeout(graceTimer);
        this.process = undefined;
        const error = new BackendProcessError(`${errMsgPrefix}: ${detail}`, {
          stage,
          language: profile.language,
          command: backendConfig.command,
          stderr: stderrOutput,
          ...extra,
        });
        this.logger.error(
          { stage, exitCode: error.exitCode, signal: error.signal, stderr: stderrOutput },
          error.message,
        );
        reject(error);
      };

      let backendProcess: child_process.ChildProcess;
      try {
        const spawnOptions: child_process.SpawnOptions = {
          stdio: ['ignore', 'pipe', 'pipe'],
          env: { ...process.env, ...backendConfig.env },
          detached: false,
        };
        if (backendConfig.cwd) {
          spawnOptions.cwd = backendConfig.cwd;
        }
        this.logger.info({ command: backendConfig.command, args }, 'Starting backend');
        backendProcess = child_process.spawn(backendConfig.command, args, spawnOptions);
      } catch (syncSpawnError: unknown) {
        const cause =
          syncSpawnError instanceof Error ? syncSpawnError : new Error(String(syncSpawnError));
        fail('spawn', cause.message, { cause });
        return;
      }
      this.process = backendProcess;

      backendProcess.on('error', (spawnError: Error) => {
        fail('spawn', spawnError.message, { cause: spawnError });
      });

      backendProcess.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        if (!settled) {
          const extra: { exitCode?: number; signal?: string } = {};
          if (code !== null) extra.exitCode = code;
          if (signal) extra.signal = signal;
          fail('early_exit', `Process exited prematurely. Code: ${code}, Signal: ${signal}`, extra);
          return;
        }
        this.logger.info({ code, signal }, 'Backend process exited');
        if (this.process === backendProcess) {
          this.process = undefined;
        }
      });

      if (backendProcess.stdout) {
        readline
          .createInterface({ input: backendProcess.stdout })
          .on('line', (line) => this.logger.debug({ stream: 'stdout' }, line));
      }
      if (backendProcess.stderr) {
        readline
          .createInterface({ input: backendProcess.stderr })
          .on('line', (line) => {
            if (!settled) {
              stderrOutput += `${line}\n`;
            }
            this.logger.debug({ stream: 'stderr' }, line);
          });
      }

      graceTimer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.logger.info({ pid: backendProcess.pid }, 'Backend process started');
        resolve(backendProcess);
      }, graceMs);
    });
  }

  /** Terminates the backend if it is still running. */
  public stop(): void {
    const backendProcess = this.process;
    this.process = undefined;
    if (backendProcess && backendProcess.exitCode === null && !backendProcess.killed) {
      this.logger.info({ pid: backendProcess.pid }, 'Terminating backend process');
      backendProcess.kill();
    }
  }
}
