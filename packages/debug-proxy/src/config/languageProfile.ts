/**
 * Maps a location inside adapter code with no resolvable function name
 * to the function the adapter is known to stop in there.
 */
export interface FunctionHint {
  fileSuffix: string;
  fromLine: number;
  toLine: number;
  functionName: string;
}

/**
 * How to start the language's native debugger backend.
 * `${program}` and `${port}` in `args` are substituted at launch.
 */
export interface LanguageBackendConfig {
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Path knowledge for one ecosystem: which source paths belong to the replay
 * adapter and workflow SDK, and which fragments never count as user code
 * even inside the working directory.
 */
export interface LanguageProfile {
  language: string;
  adapterPathPatterns: string[];
  userCodeExclusions: string[];
  functionHints?: FunctionHint[];
  backend?: LanguageBackendConfig;
}

export interface LanguageProfileFile {
  profiles: {
    [language: string]: Omit<LanguageProfile, 'language'>;
  };
}

/**
 * Unions several profiles into one. Used when a session debugs code that
 * crosses ecosystems (e.g. a Go worker calling into a JS activity host).
 */
export function mergeProfiles(profiles: LanguageProfile[]): LanguageProfile {
  if (profiles.length === 1) {
    return profiles[0];
  }
  const unique = (values: string[]) => Array.from(new Set(values));
  return {
    language: profiles.map((p) => p.language).join('+'),
    adapterPathPatterns: unique(profiles.flatMap((p) => p.adapterPathPatterns)),
    userCodeExclusions: unique(profiles.flatMap((p) => p.userCodeExclusions)),
    functionHints: profiles.flatMap((p) => p.functionHints ?? []),
    backend: profiles.find((p) => p.backend)?.backend,
  };
}
