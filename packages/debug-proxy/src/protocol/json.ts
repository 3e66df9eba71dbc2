export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Follows `path` through nested objects and arrays, yielding undefined at the
 * first missing or mistyped step.
 */
export function getPath(
  value: unknown,
  path: ReadonlyArray<string | number>,
): unknown {
  let current = value;
  for (const segment of path) {
    if (typeof segment === 'number') {
      if (!Array.isArray(current)) {
        return undefined;
      }
      current = current[segment];
    } else {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[segment];
    }
  }
  return current;
}

export function stringAt(
  value: unknown,
  path: ReadonlyArray<string | number>,
): string | undefined {
  const found = getPath(value, path);
  return typeof found === 'string' ? found : undefined;
}

export function numberAt(
  value: unknown,
  path: ReadonlyArray<string | number>,
): number | undefined {
  const found = getPath(value, path);
  return typeof found === 'number' && Number.isFinite(found) ? found : undefined;
}

export function arrayAt(
  value: unknown,
  path: ReadonlyArray<string | number>,
): unknown[] | undefined {
  const found = getPath(value, path);
  return Array.isArray(found) ? found : undefined;
}

export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; error: Error } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
