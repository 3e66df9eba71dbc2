import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProfileConfigError } from '../../src/errors';
import { LanguageProfile, mergeProfiles } from '../../src/config/languageProfile';
import {
  LanguageProfileLoader,
  parseProfileFile,
} from '../../src/config/languageProfileLoader';
import { DEFAULT_PROXY_CONFIG, resolveProxyConfig } from '../../src/config/proxyConfig';
import { createMockLogger } from '../mocks/mockLogger';

describe('LanguageProfileLoader', () => {
  let loader: LanguageProfileLoader;
  let tempDir: string;

  beforeEach(() => {
    loader = new LanguageProfileLoader(createMockLogger());
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'debug-proxy-profiles-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const writeProfiles = (content: unknown): string => {
    const file = path.join(tempDir, 'profiles.json');
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  };

  it('ships profiles for go, python, js and java', () => {
    const profiles = loader.loadDefaults();

    expect(Array.from(profiles.keys())).to.deep.equal(['go', 'python', 'js', 'java']);
    const go = profiles.get('go');
    expect(go?.language).to.equal('go');
    expect(go?.adapterPathPatterns).to.include('replayer-adapter-go/');
    expect(go?.backend?.command).to.equal('dlv');
    expect(profiles.get('java')?.backend).to.equal(undefined);
  });

  it('lets a user file replace a language and add new ones', () => {
    const file = writeProfiles({
      profiles: {
        go: { adapterPathPatterns: ['my-adapter/'], userCodeExclusions: [] },
        rust: { adapterPathPatterns: ['replayer-rs/'], userCodeExclusions: ['target/'] },
      },
    });

    const profiles = loader.load(file);

    expect(profiles.get('go')).to.deep.equal({
      language: 'go',
      adapterPathPatterns: ['my-adapter/'],
      userCodeExclusions: [],
    });
    expect(profiles.get('rust')?.userCodeExclusions).to.deep.equal(['target/']);
    expect(profiles.get('python')?.backend?.command).to.equal('python');
  });

  it('fails on a missing file', () => {
    const missing = path.join(tempDir, 'nope.json');
    expect(() => loader.loadFromFile(missing))
      .to.throw(ProfileConfigError)
      .with.property('configPath', missing);
  });

  it('fails on invalid JSON', () => {
    const file = path.join(tempDir, 'broken.json');
    fs.writeFileSync(file, '{"profiles": ');
    expect(() => loader.loadFromFile(file)).to.throw(ProfileConfigError, 'Failed to read profile file');
  });

  it('fails when a profile lacks its path lists', () => {
    const file = writeProfiles({ profiles: { go: { adapterPathPatterns: ['x/'] } } });
    expect(() => loader.loadFromFile(file)).to.throw(ProfileConfigError, 'userCodeExclusions');
  });

  it('selects profiles by name and rejects unknown languages', () => {
    const profiles = loader.loadDefaults();

    expect(loader.select(profiles, ['js', 'go']).map((p) => p.language)).to.deep.equal(['js', 'go']);
    expect(() => loader.select(profiles, ['cobol'])).to.throw(ProfileConfigError, 'Unknown language "cobol"');
  });
});

describe('parseProfileFile', () => {
  it('requires a profiles object', () => {
    expect(() => parseProfileFile([], 'inline')).to.throw(ProfileConfigError, '"profiles"');
  });

  it('validates function hints and backends', () => {
    expect(() =>
      parseProfileFile(
        {
          profiles: {
            go: {
              adapterPathPatterns: [],
              userCodeExclusions: [],
              functionHints: [{ fileSuffix: 'a.go', fromLine: 9, toLine: 1, functionName: 'f' }],
            },
          },
        },
        'inline',
      ),
    ).to.throw(ProfileConfigError, 'fromLine is after toLine');

    expect(() =>
      parseProfileFile(
        { profiles: { go: { adapterPathPatterns: [], userCodeExclusions: [], backend: { args: [] } } } },
        'inline',
      ),
    ).to.throw(ProfileConfigError, 'backend.command');
  });
});

describe('mergeProfiles', () => {
  const go: LanguageProfile = {
    language: 'go',
    adapterPathPatterns: ['replayer-adapter-go/', 'shared/'],
    userCodeExclusions: ['.git/'],
    backend: { command: 'dlv' },
  };
  const js: LanguageProfile = {
    language: 'js',
    adapterPathPatterns: ['replayer-adapter-nodejs/', 'shared/'],
    userCodeExclusions: ['node_modules/', '.git/'],
  };

  it('returns a single profile unchanged', () => {
    expect(mergeProfiles([js])).to.equal(js);
  });

  it('unions the path lists of several profiles', () => {
    expect(mergeProfiles([js, go])).to.deep.equal({
      language: 'js+go',
      adapterPathPatterns: ['replayer-adapter-nodejs/', 'shared/', 'replayer-adapter-go/'],
      userCodeExclusions: ['node_modules/', '.git/'],
      functionHints: [],
      backend: { command: 'dlv' },
    });
  });
});

describe('resolveProxyConfig', () => {
  it('fills defaults and merges nested overrides', () => {
    const config = resolveProxyConfig({
      listenPort: 7000,
      backpressure: { maxBufferedBytes: 1024 },
      autoStep: { maxSteps: 5 },
    });

    expect(config.listenPort).to.equal(7000);
    expect(config.backendPort).to.equal(2345);
    expect(config.dialRetries).to.equal(3);
    expect(config.backpressure.maxBufferedBytes).to.equal(1024);
    expect(config.backpressure.maxMessagesPerPush).to.equal(100);
    expect(config.autoStep).to.deep.equal({ maxSteps: 5, pollDelayMs: 200, requestTimeoutMs: 10000 });
    expect(DEFAULT_PROXY_CONFIG.autoStep.maxSteps).to.equal(30);
  });
});
