import * as path from 'path';
import { LanguageProfile } from '../config/languageProfile';

/**
 * A path is user code when it resolves under `cwd` and contains none of the
 * profile's exclusion fragments (adapter checkouts, vendored SDKs, VCS dirs).
 */
export function isUserCodeFile(
  file: string,
  cwd: string,
  profile: LanguageProfile,
): boolean {
  if (!file) {
    return false;
  }
  const absolute = path.resolve(cwd, file);
  const root = path.resolve(cwd);
  if (absolute !== root && !absolute.startsWith(root + path.sep)) {
    return false;
  }
  return !profile.userCodeExclusions.some((fragment) =>
    absolute.includes(fragment),
  );
}

/**
 * Sentinel predicate: true when a stop at `file` belongs to the replay
 * adapter or SDK and must be stepped out of. Empty paths are not adapter code.
 */
export function isAdapterCodePath(
  file: string,
  cwd: string,
  profile: LanguageProfile,
): boolean {
  if (!file || isUserCodeFile(file, cwd, profile)) {
    return false;
  }
  return profile.adapterPathPatterns.some((pattern) => file.includes(pattern));
}

export class CodeClassifier {
  constructor(
    public readonly profile: LanguageProfile,
    private readonly cwd: () => string = () => process.cwd(),
  ) {}

  public isUserCode(file: string): boolean {
    return isUserCodeFile(file, this.cwd(), this.profile);
  }

  public isAdapterCode(file: string): boolean {
    return isAdapterCodePath(file, this.cwd(), this.profile);
  }

  /**
   * Function name for adapter locations the backend reports without one.
   */
  public hintFunction(file: string, line: number): string | undefined {
    const hint = this.profile.functionHints?.find(
      (h) => file.endsWith(h.fileSuffix) && line >= h.fromLine && line <= h.toLine,
    );
    return hint?.functionName;
  }
}
