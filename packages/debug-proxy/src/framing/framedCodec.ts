import { FramingErrorReason } from '../errors';
import { BackpressurePolicy } from './backpressurePolicy';
import { TWO_CRLF } from './wireFormat';

const CONTENT_LENGTH_LINE = /^content-length\s*:(.*)$/i;

export interface FramingInvalid {
  kind: 'invalid';
  reason: FramingErrorReason;
  detail: string;
  /** Buffer offset at which to resume looking for a frame. */
  skipTo: number;
}

export interface FramingIncomplete {
  kind: 'incomplete';
}

export interface FramedComplete {
  kind: 'complete';
  /** Start of the `Content-Length` line; bytes before it are inter-frame noise. */
  headerStart: number;
  bodyStart: number;
  frameEnd: number;
  body: Buffer;
  /** Bytes after `frameEnd` that form further complete, well-formed frames. */
  trailingCompleteBytes: number;
  /** Where a trailing partial (or malformed) frame begins, if any. */
  trailingPartialOffset: number | undefined;
}

export type FramedExtraction = FramingIncomplete | FramingInvalid | FramedComplete;

type HeaderResult =
  | FramingIncomplete
  | FramingInvalid
  | { kind: 'header'; headerStart: number; bodyStart: number; length: number };

function readHeader(
  buffer: Buffer,
  offset: number,
  policy: BackpressurePolicy,
): HeaderResult {
  const headerEnd = buffer.indexOf(TWO_CRLF, offset);
  if (headerEnd === -1) {
    return { kind: 'incomplete' };
  }
  const skipTo = headerEnd + TWO_CRLF.length;
  // latin1 keeps string offsets equal to byte offsets
  const headerText = buffer.toString('latin1', offset, headerEnd);

  let lineStart = 0;
  for (const rawLine of headerText.split('\n')) {
    const line = rawLine.replace(/\r$/, '');
    const trimmed = line.trimStart();
    const match = CONTENT_LENGTH_LINE.exec(trimmed);
    if (match) {
      const value = match[1].trim();
      if (!/^\d+$/.test(value)) {
        return {
          kind: 'invalid',
          reason: 'invalid-length',
          detail: `Invalid Content-Length: ${value}`,
          skipTo,
        };
      }
      const length = parseInt(value, 10);
      if (length > policy.maxFrameBodyBytes) {
        return {
          kind: 'invalid',
          reason: 'oversized',
          detail: `Content-Length ${length} exceeds maximum ${policy.maxFrameBodyBytes}`,
          skipTo,
        };
      }
      return {
        kind: 'header',
        headerStart: offset + lineStart + (line.length - trimmed.length),
        bodyStart: skipTo,
        length,
      };
    }
    lineStart += rawLine.length + 1;
  }

  return {
    kind: 'invalid',
    reason: 'missing-length',
    detail: 'Missing Content-Length header',
    skipTo,
  };
}

/**
 * Walks the frames that follow `offset` without consuming them.
 */
export function scanCompleteFrames(
  buffer: Buffer,
  offset: number,
  policy: BackpressurePolicy,
): { completeBytes: number; partialOffset: number | undefined } {
  let pos = offset;
  while (pos < buffer.length) {
    const header = readHeader(buffer, pos, policy);
    if (header.kind !== 'header') {
      return { completeBytes: pos - offset, partialOffset: pos };
    }
    const end = header.bodyStart + header.length;
    if (end > buffer.length) {
      return { completeBytes: pos - offset, partialOffset: pos };
    }
    pos = end;
  }
  return { completeBytes: pos - offset, partialOffset: undefined };
}

/**
 * Extracts the first Content-Length framed message from `buffer`.
 */
export function extractFramedMessage(
  buffer: Buffer,
  policy: BackpressurePolicy,
): FramedExtraction {
  const header = readHeader(buffer, 0, policy);
  if (header.kind !== 'header') {
    return header;
  }
  const frameEnd = header.bodyStart + header.length;
  if (frameEnd > buffer.length) {
    return { kind: 'incomplete' };
  }
  const trailing = scanCompleteFrames(buffer, frameEnd, policy);
  return {
    kind: 'complete',
    headerStart: header.headerStart,
    bodyStart: header.bodyStart,
    frameEnd,
    body: buffer.subarray(header.bodyStart, frameEnd),
    trailingCompleteBytes: trailing.completeBytes,
    trailingPartialOffset: trailing.partialOffset,
  };
}
