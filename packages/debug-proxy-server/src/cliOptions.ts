import yargs from 'yargs/yargs';
import {
  DEFAULT_PROXY_CONFIG,
  ProxyConfig,
  resolveProxyConfig,
} from 'workflow-debug-proxy';
import { LOG_LEVELS, LogLevel, isLogLevel } from './logger';

export const SERVER_VERSION = '0.1.0';

export interface CliOptions {
  port: number;
  host: string;
  languages: string[];
  backendHost: string;
  backendPort: number;
  dialRetries: number;
  dialDelayMs: number;
  sessionTimeoutMinutes: number;
  maxAutoSteps: number;
  maxBufferBytes?: number;
  profilesPath?: string;
  start: boolean;
  program?: string;
  contentStacktraceDetection: boolean;
  logLevel: LogLevel;
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Throws on invalid input. `--help` and `--version` only exit the process
 * when `behaviour.exitProcess` is set.
 */
export function parseCliOptions(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
  behaviour: { exitProcess?: boolean } = {},
): CliOptions {
  const argv = yargs(args)
    .scriptName('debug-proxy')
    .usage('Usage: $0 --lang <go|python|js|java>[,...] [options]')
    .option('port', {
      alias: 'p',
      type: 'number',
      default: DEFAULT_PROXY_CONFIG.listenPort,
      description: 'Port the IDE connects to',
    })
    .option('host', {
      type: 'string',
      default: DEFAULT_PROXY_CONFIG.listenHost,
      description: 'Interface to listen on',
    })
    .option('lang', {
      alias: 'l',
      type: 'string',
      demandOption: true,
      description: 'Comma-separated language profiles (go, python, js, java)',
    })
    .option('backend-host', {
      type: 'string',
      default: DEFAULT_PROXY_CONFIG.backendHost,
      description: 'Host of the native debugger backend',
    })
    .option('backend-port', {
      type: 'number',
      default: DEFAULT_PROXY_CONFIG.backendPort,
      description: 'Port of the native debugger backend',
    })
    .option('dial-retries', {
      type: 'number',
      default: DEFAULT_PROXY_CONFIG.dialRetries,
      description: 'Backend connection attempts per session',
    })
    .option('dial-delay', {
      type: 'number',
      default: DEFAULT_PROXY_CONFIG.dialDelayMs,
      description: 'Milliseconds between backend connection attempts',
    })
    .option('session-timeout', {
      type: 'number',
      default: DEFAULT_PROXY_CONFIG.sessionTimeoutMs / 60000,
      description: 'Session lifetime in minutes (0 disables)',
    })
    .option('max-auto-steps', {
      type: 'number',
      default: DEFAULT_PROXY_CONFIG.autoStep.maxSteps,
      description: 'Step-over limit when leaving adapter code',
    })
    .option('max-buffer', {
      type: 'number',
      description: 'Unframed bytes buffered per direction before discarding',
    })
    .option('profiles', {
      type: 'string',
      description: 'Language profile JSON file overriding the defaults',
    })
    .option('start', {
      type: 'boolean',
      default: false,
      description: "Launch the language's debugger backend",
    })
    .option('program', {
      type: 'string',
      description: 'Debuggee passed to the launched backend',
    })
    .option('content-stacktrace-detection', {
      type: 'boolean',
      default: false,
      description: 'Also filter responses that merely look like stack traces',
    })
    .option('log-level', {
      type: 'string',
      choices: LOG_LEVELS,
      default: env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info',
      description: 'Log level',
    })
    .check((parsed) => {
      for (const name of ['port', 'backend-port'] as const) {
        const value = parsed[name];
        if (!Number.isInteger(value) || value < 0 || value > 65535) {
          throw new Error(`--${name} must be a port number, got ${value}`);
        }
      }
      for (const name of ['dial-retries', 'max-auto-steps'] as const) {
        if (!Number.isInteger(parsed[name]) || parsed[name] < 1) {
          throw new Error(`--${name} must be a positive integer`);
        }
      }
      if (parsed['max-buffer'] !== undefined && !(parsed['max-buffer'] > 0)) {
        throw new Error('--max-buffer must be positive');
      }
      return true;
    })
    .strict()
    .help()
    .alias('help', 'h')
    .version(SERVER_VERSION)
    .alias('version', 'v')
    .exitProcess(behaviour.exitProcess ?? false)
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .parseSync();

  const languages = argv.lang
    .split(',')
    .map((language) => language.trim())
    .filter((language) => language.length > 0);
  if (languages.length === 0) {
    throw new Error('--lang needs at least one language');
  }
  const logLevel = argv['log-level'];

  const options: CliOptions = {
    port: argv.port,
    host: argv.host,
    languages,
    backendHost: argv['backend-host'],
    backendPort: argv['backend-port'],
    dialRetries: argv['dial-retries'],
    dialDelayMs: argv['dial-delay'],
    sessionTimeoutMinutes: argv['session-timeout'],
    maxAutoSteps: argv['max-auto-steps'],
    start: argv.start,
    contentStacktraceDetection: argv['content-stacktrace-detection'],
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
  if (argv['max-buffer'] !== undefined) {
    options.maxBufferBytes = argv['max-buffer'];
  }
  if (argv.profiles !== undefined) {
    options.profilesPath = argv.profiles;
  }
  if (argv.program !== undefined) {
    options.program = argv.program;
  }
  return options;
}

export function toProxyConfig(options: CliOptions): ProxyConfig {
  return resolveProxyConfig({
    listenHost: options.host,
    listenPort: options.port,
    backendHost: options.backendHost,
    backendPort: options.backendPort,
    dialRetries: options.dialRetries,
    dialDelayMs: options.dialDelayMs,
    sessionTimeoutMs: Math.round(options.sessionTimeoutMinutes * 60000),
    detectStackTraceByContent: options.contentStacktraceDetection,
    autoStep: { maxSteps: options.maxAutoSteps },
    backpressure:
      options.maxBufferBytes !== undefined
        ? { maxBufferedBytes: options.maxBufferBytes }
        : {},
  });
}
