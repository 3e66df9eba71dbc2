import * as fs from 'fs';
import * as path from 'path';
import { LoggerInterface, childLogger } from '../logging';
import { ProfileConfigError, errorMessage } from '../errors';
import {
  FunctionHint,
  LanguageBackendConfig,
  LanguageProfile,
  LanguageProfileFile,
} from './languageProfile';
import defaultProfiles from './defaultLanguageProfiles.json';

type ProfileBody = Omit<LanguageProfile, 'language'>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function parseFunctionHint(value: unknown, where: string): FunctionHint {
  if (
    !isRecord(value) ||
    typeof value.fileSuffix !== 'string' ||
    typeof value.fromLine !== 'number' ||
    typeof value.toLine !== 'number' ||
    typeof value.functionName !== 'string'
  ) {
    throw new ProfileConfigError(
      `${where}: function hints need fileSuffix, fromLine, toLine and functionName`,
    );
  }
  if (value.fromLine > value.toLine) {
    throw new ProfileConfigError(`${where}: fromLine is after toLine`);
  }
  return {
    fileSuffix: value.fileSuffix,
    fromLine: value.fromLine,
    toLine: value.toLine,
    functionName: value.functionName,
  };
}

function parseBackend(value: unknown, where: string): LanguageBackendConfig {
  if (!isRecord(value) || typeof value.command !== 'string' || !value.command) {
    throw new ProfileConfigError(`${where}: backend.command must be a string`);
  }
  const backend: LanguageBackendConfig = { command: value.command };
  if (value.args !== undefined) {
    if (!isStringArray(value.args)) {
      throw new ProfileConfigError(`${where}: backend.args must be strings`);
    }
    backend.args = value.args;
  }
  if (value.env !== undefined) {
    const env = value.env;
    if (
      !isRecord(env) ||
      !Object.values(env).every((v) => typeof v === 'string')
    ) {
      throw new ProfileConfigError(`${where}: backend.env must map to strings`);
    }
    backend.env = Object.fromEntries(
      Object.entries(env).map(([k, v]) => [k, String(v)]),
    );
  }
  if (value.cwd !== undefined) {
    if (typeof value.cwd !== 'string') {
      throw new ProfileConfigError(`${where}: backend.cwd must be a string`);
    }
    backend.cwd = value.cwd;
  }
  return backend;
}

function parseProfileBody(value: unknown, where: string): ProfileBody {
  if (!isRecord(value)) {
    throw new ProfileConfigError(`${where}: profile must be an object`);
  }
  if (!isStringArray(value.adapterPathPatterns)) {
    throw new ProfileConfigError(
      `${where}: missing or invalid "adapterPathPatterns"`,
    );
  }
  if (!isStringArray(value.userCodeExclusions)) {
    throw new ProfileConfigError(
      `${where}: missing or invalid "userCodeExclusions"`,
    );
  }
  const body: ProfileBody = {
    adapterPathPatterns: value.adapterPathPatterns,
    userCodeExclusions: value.userCodeExclusions,
  };
  if (value.functionHints !== undefined) {
    if (!Array.isArray(value.functionHints)) {
      throw new ProfileConfigError(`${where}: "functionHints" must be a list`);
    }
    body.functionHints = value.functionHints.map((hint) =>
      parseFunctionHint(hint, where),
    );
  }
  if (value.backend !== undefined) {
    body.backend = parseBackend(value.backend, where);
  }
  return body;
}

/**
 * Checks the `{ profiles: { <language>: {...} } }` shape of a profile file.
 */
export function parseProfileFile(
  content: unknown,
  source: string,
): LanguageProfileFile {
  if (!isRecord(content) || !isRecord(content.profiles)) {
    throw new ProfileConfigError(
      `Invalid profile file format: missing or invalid "profiles" property in ${source}`,
      source,
    );
  }
  const profiles: LanguageProfileFile['profiles'] = {};
  for (const [language, body] of Object.entries(content.profiles)) {
    try {
      profiles[language] = parseProfileBody(body, `${source} [${language}]`);
    } catch (error) {
      if (error instanceof ProfileConfigError) {
        throw new ProfileConfigError(error.message, source);
      }
      throw error;
    }
  }
  return { profiles };
}

/**
 * Loads language profiles: the bundled defaults, optionally overridden per
 * language by a user file.
 */
export class LanguageProfileLoader {
  private readonly logger: LoggerInterface;

  constructor(logger: LoggerInterface) {
    this.logger = childLogger(logger, { component: 'LanguageProfileLoader' });
  }

  public loadDefaults(): Map<string, LanguageProfile> {
    return this.toMap(parseProfileFile(defaultProfiles, 'defaults'));
  }

  /**
   * Loads a profile file. Relative paths resolve against the working directory.
   */
  public loadFromFile(configPath: string): Map<string, LanguageProfile> {
    const resolvedPath = path.isAbsolute(configPath)
      ? configPath
      : path.resolve(process.cwd(), configPath);

    if (!fs.existsSync(resolvedPath)) {
      this.logger.error({ path: resolvedPath }, 'Profile file not found');
      throw new ProfileConfigError(
        `Profile file not found: ${resolvedPath}`,
        resolvedPath,
      );
    }

    let content: unknown;
    try {
      content = JSON.parse(fs.readFileSync(resolvedPath, 'utf8'));
    } catch (error) {
      throw new ProfileConfigError(
        `Failed to read profile file ${resolvedPath}: ${errorMessage(error)}`,
        resolvedPath,
      );
    }

    const profiles = this.toMap(parseProfileFile(content, resolvedPath));
    this.logger.info(
      { path: resolvedPath, languages: Array.from(profiles.keys()) },
      `Loaded ${profiles.size} language profiles`,
    );
    return profiles;
  }

  /**
   * Defaults with the languages found in `overridePath` replaced wholesale.
   */
  public load(overridePath?: string): Map<string, LanguageProfile> {
    const profiles = this.loadDefaults();
    if (overridePath) {
      for (const [language, profile] of this.loadFromFile(overridePath)) {
        profiles.set(language, profile);
      }
    }
    return profiles;
  }

  /**
   * Picks the profiles for `languages`, failing on any unknown name.
   */
  public select(
    profiles: Map<string, LanguageProfile>,
    languages: string[],
  ): LanguageProfile[] {
    return languages.map((language) => {
      const profile = profiles.get(language);
      if (!profile) {
        throw new ProfileConfigError(
          `Unknown language "${language}". Known: ${Array.from(profiles.keys()).join(', ')}`,
        );
      }
      return profile;
    });
  }

  private toMap(file: LanguageProfileFile): Map<string, LanguageProfile> {
    const profiles = new Map<string, LanguageProfile>();
    for (const [language, body] of Object.entries(file.profiles)) {
      profiles.set(language, { language, ...body });
    }
    return profiles;
  }
}
