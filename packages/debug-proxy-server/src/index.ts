#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import {
  BackendLauncher,
  CodeClassifier,
  LanguageProfile,
  LanguageProfileLoader,
  LoggerInterface,
  ProxyConfig,
  SessionManager,
  errorMessage,
  mergeProfiles,
} from 'workflow-debug-proxy';
import { CliOptions, parseCliOptions, toProxyConfig } from './cliOptions';
import { createLogger } from './logger';

export type { CliOptions } from './cliOptions';
export { parseCliOptions, toProxyConfig } from './cliOptions';
export { createLogger } from './logger';

/**
 * The proxy process: profiles, optional backend launch, client listener
 * and shutdown handling.
 */
export class DebugProxyServer {
  private readonly config: ProxyConfig;
  private readonly profile: LanguageProfile;
  private readonly sessionManager: SessionManager;
  private readonly launcher: BackendLauncher;
  private shuttingDown = false;

  constructor(
    private readonly options: CliOptions,
    private readonly logger: LoggerInterface,
  ) {
    this.config = toProxyConfig(options);

    const loader = new LanguageProfileLoader(logger);
    const profiles = loader.load(options.profilesPath);
    this.profile = mergeProfiles(loader.select(profiles, options.languages));
    if (options.languages.length > 1) {
      this.logger.info(
        { languages: options.languages },
        'Multiple languages selected, using the union of their profiles',
      );
    }

    this.sessionManager = new SessionManager(
      this.config,
      new CodeClassifier(this.profile),
      logger,
    );
    this.launcher = new BackendLauncher(logger);
  }

  public async run(): Promise<void> {
    if (this.options.start) {
      const launchOptions: { port: number; program?: string } = {
        port: this.config.backendPort,
      };
      if (this.options.program !== undefined) {
        launchOptions.program = this.options.program;
      }
      await this.launcher.launch(this.profile, launchOptions);
    }

    try {
      const address = await this.sessionManager.listen();
      this.logger.info(
        {
          port: address.port,
          backend: `${this.config.backendHost}:${this.config.backendPort}`,
          language: this.profile.language,
          cwd: process.cwd(),
        },
        'Debug proxy ready',
      );
    } catch (error) {
      this.launcher.stop();
      throw error;
    }
  }

  public async shutdown(signal: string): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.logger.info({ signal }, 'Shutting down debug proxy');
    try {
      await this.sessionManager.close();
    } finally {
      this.launcher.stop();
    }
  }
}

async function main(): Promise<void> {
  const options = parseCliOptions(hideBin(process.argv), process.env, {
    exitProcess: true,
  });
  const logger = createLogger({ level: options.logLevel });
  const server = new DebugProxyServer(options, logger);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      server
        .shutdown(signal)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ err: error }, `Shutdown failed: ${errorMessage(error)}`);
          process.exit(1);
        });
    });
  }

  await server.run();
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Failed to start debug proxy: ${errorMessage(error)}`);
    process.exit(1);
  });
}
