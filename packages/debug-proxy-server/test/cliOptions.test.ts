import { expect } from 'chai';
import { parseCliOptions, toProxyConfig } from '../src/cliOptions';
import { isLogLevel } from '../src/logger';

describe('parseCliOptions', () => {
  it('applies defaults', () => {
    const options = parseCliOptions(['--lang', 'go'], {});

    expect(options).to.deep.equal({
      port: 60000,
      host: '127.0.0.1',
      languages: ['go'],
      backendHost: '127.0.0.1',
      backendPort: 2345,
      dialRetries: 3,
      dialDelayMs: 1000,
      sessionTimeoutMinutes: 30,
      maxAutoSteps: 30,
      start: false,
      contentStacktraceDetection: false,
      logLevel: 'info',
    });
  });

  it('reads every flag', () => {
    const options = parseCliOptions(
      [
        '-p', '7000',
        '--host', '0.0.0.0',
        '-l', 'go, js',
        '--backend-host', 'debugger.local',
        '--backend-port', '4000',
        '--dial-retries', '5',
        '--dial-delay', '250',
        '--session-timeout', '5',
        '--max-auto-steps', '12',
        '--max-buffer', '4096',
        '--profiles', 'profiles.json',
        '--start',
        '--program', './worker',
        '--content-stacktrace-detection',
        '--log-level', 'debug',
      ],
      {},
    );

    expect(options).to.deep.equal({
      port: 7000,
      host: '0.0.0.0',
      languages: ['go', 'js'],
      backendHost: 'debugger.local',
      backendPort: 4000,
      dialRetries: 5,
      dialDelayMs: 250,
      sessionTimeoutMinutes: 5,
      maxAutoSteps: 12,
      maxBufferBytes: 4096,
      profilesPath: 'profiles.json',
      start: true,
      program: './worker',
      contentStacktraceDetection: true,
      logLevel: 'debug',
    });
  });

  it('takes the log level from LOG_LEVEL', () => {
    expect(parseCliOptions(['--lang', 'go'], { LOG_LEVEL: 'warn' }).logLevel).to.equal('warn');
    expect(parseCliOptions(['--lang', 'go'], { LOG_LEVEL: 'loud' }).logLevel).to.equal('info');
  });

  it('rejects bad input', () => {
    expect(() => parseCliOptions([], {})).to.throw(/lang/);
    expect(() => parseCliOptions(['--lang', 'go', '--port', '70000'], {})).to.throw(/--port must be a port number/);
    expect(() => parseCliOptions(['--lang', 'go', '--dial-retries', '0'], {})).to.throw(
      /--dial-retries must be a positive integer/,
    );
    expect(() => parseCliOptions(['--lang', ' , '], {})).to.throw('--lang needs at least one language');
    expect(() => parseCliOptions(['--lang', 'go', '--frobnicate'], {})).to.throw(/frobnicate/);
  });
});

describe('toProxyConfig', () => {
  it('maps options onto the proxy configuration', () => {
    const config = toProxyConfig(
      parseCliOptions(
        ['--lang', 'go', '--session-timeout', '0.5', '--max-buffer', '2048', '--max-auto-steps', '4'],
        {},
      ),
    );

    expect(config.sessionTimeoutMs).to.equal(30000);
    expect(config.backpressure.maxBufferedBytes).to.equal(2048);
    expect(config.backpressure.maxMessagesPerPush).to.equal(100);
    expect(config.autoStep.maxSteps).to.equal(4);
    expect(config.detectStackTraceByContent).to.equal(false);
    expect(config.listenPort).to.equal(60000);
  });
});

describe('isLogLevel', () => {
  it('accepts pino level names', () => {
    expect(isLogLevel('trace')).to.equal(true);
    expect(isLogLevel('silent')).to.equal(true);
    expect(isLogLevel('verbose')).to.equal(false);
  });
});
