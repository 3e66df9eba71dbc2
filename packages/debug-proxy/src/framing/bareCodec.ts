import { BackpressurePolicy } from './backpressurePolicy';
import { FramingIncomplete, FramingInvalid } from './framedCodec';

const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;

/** Nesting and string state of a brace-balancing scan. */
export interface BraceScan {
  depth: number;
  inString: boolean;
  escaped: boolean;
}

/**
 * Where a brace-balancing scan stopped, so the next chunk does not rescan.
 */
export interface BareScanState extends BraceScan {
  start: number;
  pos: number;
}

export type BareExtraction =
  | (FramingIncomplete & { state?: BareScanState })
  | (FramingInvalid & { skip?: BraceScan })
  | { kind: 'complete'; start: number; end: number };

export type BareSkip = { kind: 'skipped'; end: number } | { kind: 'skipping'; scan: BraceScan };

/**
 * Feeds one byte to `scan`.
 * @returns true when the byte closed the outermost object.
 */
function advance(scan: BraceScan, byte: number | undefined): boolean {
  if (scan.inString) {
    if (scan.escaped) {
      scan.escaped = false;
    } else if (byte === BACKSLASH) {
      scan.escaped = true;
    } else if (byte === QUOTE) {
      scan.inString = false;
    }
    return false;
  }
  if (byte === QUOTE) {
    scan.inString = true;
  } else if (byte === OPEN_BRACE) {
    scan.depth++;
  } else if (byte === CLOSE_BRACE) {
    scan.depth--;
    return scan.depth === 0;
  }
  return false;
}

/**
 * Finds the first brace-balanced JSON object in `buffer`. Braces inside
 * string literals (including escaped quotes) do not count.
 *
 * An object that outgrows `maxFrameBodyBytes` is reported as invalid with
 * `skipTo` at the first unscanned byte and `skip` holding the scan state;
 * `skipBareObject` then discards the rest of it.
 */
export function extractBareMessage(
  buffer: Buffer,
  policy: BackpressurePolicy,
  resume?: BareScanState,
): BareExtraction {
  const start = resume ? resume.start : buffer.indexOf(OPEN_BRACE);
  if (start === -1) {
    return { kind: 'incomplete' };
  }

  const scan: BraceScan = resume
    ? { depth: resume.depth, inString: resume.inString, escaped: resume.escaped }
    : { depth: 0, inString: false, escaped: false };

  for (let i = resume ? resume.pos : start; i < buffer.length; i++) {
    if (i - start >= policy.maxFrameBodyBytes) {
      const detail = `JSON object exceeds maximum ${policy.maxFrameBodyBytes} bytes`;
      return scan.depth > 0
        ? { kind: 'invalid', reason: 'oversized', detail, skipTo: i, skip: scan }
        : { kind: 'invalid', reason: 'oversized', detail, skipTo: start + 1 };
    }
    if (advance(scan, buffer[i])) {
      return { kind: 'complete', start, end: i + 1 };
    }
  }

  return {
    kind: 'incomplete',
    state: { start, pos: buffer.length, ...scan },
  };
}

/**
 * Continues discarding an oversized object from the start of `buffer`.
 */
export function skipBareObject(buffer: Buffer, skip: BraceScan): BareSkip {
  const scan: BraceScan = { ...skip };
  for (let i = 0; i < buffer.length; i++) {
    if (advance(scan, buffer[i])) {
      return { kind: 'skipped', end: i + 1 };
    }
  }
  return { kind: 'skipping', scan };
}
