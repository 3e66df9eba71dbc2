/**
 * Text-level JSON editing. Backend payloads carry 64-bit program counters
 * that JSON.parse would round, so rewrites splice the raw text and leave
 * every byte outside the edited span untouched.
 */

export type JsonPath = ReadonlyArray<string | number>;

export interface Span {
  start: number;
  end: number;
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function skipWhitespace(text: string, pos: number): number {
  while (pos < text.length && isWhitespace(text[pos])) {
    pos++;
  }
  return pos;
}

function expect(text: string, pos: number, ch: string): number {
  if (text[pos] !== ch) {
    throw new SyntaxError(
      `Expected '${ch}' at offset ${pos}, found '${text[pos] ?? 'end of input'}'`,
    );
  }
  return pos + 1;
}

function skipString(text: string, pos: number): number {
  pos = expect(text, pos, '"');
  while (pos < text.length) {
    const ch = text[pos];
    if (ch === '\\') {
      pos += 2;
    } else if (ch === '"') {
      return pos + 1;
    } else {
      pos++;
    }
  }
  throw new SyntaxError('Unterminated string');
}

function skipScalar(text: string, pos: number): number {
  const start = pos;
  while (pos < text.length && !',}]'.includes(text[pos]) && !isWhitespace(text[pos])) {
    pos++;
  }
  if (pos === start) {
    throw new SyntaxError(`Unexpected '${text[pos] ?? 'end of input'}' at offset ${pos}`);
  }
  return pos;
}

/** Returns the offset just past the value starting at `pos`. */
function skipValue(text: string, pos: number): number {
  switch (text[pos]) {
    case '{': {
      let p = skipWhitespace(text, pos + 1);
      if (text[p] === '}') {
        return p + 1;
      }
      for (;;) {
        p = skipString(text, p);
        p = skipWhitespace(text, p);
        p = expect(text, p, ':');
        p = skipValue(text, skipWhitespace(text, p));
        p = skipWhitespace(text, p);
        if (text[p] === '}') {
          return p + 1;
        }
        p = skipWhitespace(text, expect(text, p, ','));
      }
    }
    case '[': {
      let p = skipWhitespace(text, pos + 1);
      if (text[p] === ']') {
        return p + 1;
      }
      for (;;) {
        p = skipWhitespace(text, skipValue(text, p));
        if (text[p] === ']') {
          return p + 1;
        }
        p = skipWhitespace(text, expect(text, p, ','));
      }
    }
    case '"':
      return skipString(text, pos);
    default:
      return skipScalar(text, pos);
  }
}

function memberValue(text: string, span: Span, key: string): Span | undefined {
  if (text[span.start] !== '{') {
    return undefined;
  }
  let p = skipWhitespace(text, span.start + 1);
  if (text[p] === '}') {
    return undefined;
  }
  for (;;) {
    const keyEnd = skipString(text, p);
    const name: unknown = JSON.parse(text.slice(p, keyEnd));
    p = skipWhitespace(text, expect(text, skipWhitespace(text, keyEnd), ':'));
    const valueEnd = skipValue(text, p);
    if (name === key) {
      return { start: p, end: valueEnd };
    }
    p = skipWhitespace(text, valueEnd);
    if (text[p] === '}') {
      return undefined;
    }
    p = skipWhitespace(text, expect(text, p, ','));
  }
}

function elementsOf(text: string, span: Span): Span[] | undefined {
  if (text[span.start] !== '[') {
    return undefined;
  }
  const elements: Span[] = [];
  let p = skipWhitespace(text, span.start + 1);
  if (text[p] === ']') {
    return elements;
  }
  for (;;) {
    const end = skipValue(text, p);
    elements.push({ start: p, end });
    p = skipWhitespace(text, end);
    if (text[p] === ']') {
      return elements;
    }
    p = skipWhitespace(text, expect(text, p, ','));
  }
}

/**
 * Raw span of the value at `path`, or undefined when any step is missing or
 * has the wrong shape. Throws SyntaxError on malformed text along the way.
 */
export function locateValue(json: string, path: JsonPath): Span | undefined {
  const rootStart = skipWhitespace(json, 0);
  let span: Span | undefined = { start: rootStart, end: skipValue(json, rootStart) };
  for (const segment of path) {
    if (!span) {
      return undefined;
    }
    if (typeof segment === 'string') {
      span = memberValue(json, span, segment);
    } else {
      const elements = elementsOf(json, span);
      span = elements ? elements[segment] : undefined;
    }
  }
  return span;
}

export function arrayElementSpans(json: string, path: JsonPath): Span[] | undefined {
  const span = locateValue(json, path);
  return span ? elementsOf(json, span) : undefined;
}

/**
 * Keeps the first `keep` elements of the array at `path`.
 * Returns the input unchanged when the array is already short enough.
 */
export function truncateArray(
  json: string,
  path: JsonPath,
  keep: number,
): string | undefined {
  const span = locateValue(json, path);
  const elements = span ? elementsOf(json, span) : undefined;
  if (!span || !elements) {
    return undefined;
  }
  if (keep >= elements.length) {
    return json;
  }
  const kept =
    keep <= 0 ? '[]' : `${json.slice(span.start, elements[keep - 1].end)}]`;
  return json.slice(0, span.start) + kept + json.slice(span.end);
}

export function replaceValue(
  json: string,
  path: JsonPath,
  rawValue: string,
): string | undefined {
  const span = locateValue(json, path);
  if (!span) {
    return undefined;
  }
  return json.slice(0, span.start) + rawValue + json.slice(span.end);
}
