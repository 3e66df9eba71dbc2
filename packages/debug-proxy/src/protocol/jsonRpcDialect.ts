import { CodeClassifier } from '../classify/codeClassifier';
import { replaceValue, truncateArray } from '../framing/jsonSpans';
import { WireMessage } from '../framing/messageFramer';
import { encodeFrame } from '../framing/wireFormat';
import { RequestRecord } from '../state/correlationTable';
import { Location } from '../state/locationState';
import { normalizeId } from '../state/normalizeId';
import {
  DelveMethod,
  DelveStateSummary,
  EXECUTION_COMMANDS,
  FRAME_SCOPED_METHODS,
  summarizeState,
} from './delveTypes';
import {
  ProtocolDialect,
  StackFrameSummary,
  StopCandidate,
} from './dialect';
import {
  Envelope,
  EventEnvelope,
  RequestEnvelope,
  ResponseEnvelope,
} from './envelopes';
import { arrayAt, getPath, isRecord, numberAt, stringAt, tryParseJson } from './json';

const LOCATIONS_PATH = ['result', 'Locations'];
const STATE_PATH = ['result', 'State'];
const FRAME_PATH = ['params', 0, 'Scope', 'Frame'];

/**
 * Delve's JSON-RPC 2 API over bare brace-delimited JSON.
 */
export class JsonRpcDialect implements ProtocolDialect {
  public readonly name = 'json-rpc';
  public readonly format = 'bare';

  constructor(private readonly classifier: CodeClassifier) {}

  public decode(message: WireMessage): Envelope | undefined {
    const text = message.body.toString('utf8');
    const parsed = tryParseJson(text);
    if (!parsed.ok) {
      return undefined;
    }
    const value = parsed.value;
    if (isRecord(value)) {
      if (typeof value.method === 'string') {
        const request: RequestEnvelope = {
          kind: 'request',
          id: normalizeId(value.id),
          method: value.method,
          message,
          text,
          value,
        };
        if (value.method === DelveMethod.Command) {
          const name = stringAt(value, ['params', 0, 'name']);
          if (name) {
            request.subcommand = name;
          }
        }
        return request;
      }
      if ('id' in value && ('result' in value || 'error' in value)) {
        return {
          kind: 'response',
          id: normalizeId(value.id),
          success: value.error === null || value.error === undefined,
          message,
          text,
          value,
        };
      }
    }
    return { kind: 'raw', message, text, value };
  }

  public encode(text: string): Buffer {
    return encodeFrame('bare', text);
  }

  public executionVerb(method: string, subcommand?: string): string | undefined {
    if (
      method === DelveMethod.Command &&
      subcommand &&
      EXECUTION_COMMANDS.has(subcommand.toLowerCase())
    ) {
      return subcommand;
    }
    return undefined;
  }

  public isStackTraceRecord(record: RequestRecord): boolean {
    return record.method === DelveMethod.Stacktrace;
  }

  public looksLikeStackTrace(response: ResponseEnvelope): boolean {
    const lower = response.text.toLowerCase();
    return (
      lower.includes('locations') &&
      lower.includes('file') &&
      lower.includes('line') &&
      arrayAt(response.value, LOCATIONS_PATH) !== undefined
    );
  }

  public stackFrames(response: ResponseEnvelope): StackFrameSummary[] | undefined {
    const locations = arrayAt(response.value, LOCATIONS_PATH);
    return locations?.map((loc) => ({
      file: stringAt(loc, ['file']) ?? '',
      line: numberAt(loc, ['line']) ?? 0,
      function: stringAt(loc, ['function', 'name']) ?? '',
    }));
  }

  public truncateStackTrace(response: ResponseEnvelope, keep: number): string | undefined {
    return truncateArray(response.text, LOCATIONS_PATH, keep);
  }

  public frameIndex(request: RequestEnvelope): number | undefined {
    if (!FRAME_SCOPED_METHODS.has(request.method)) {
      return undefined;
    }
    const frame = numberAt(request.value, FRAME_PATH);
    return frame !== undefined && Number.isInteger(frame) ? frame : undefined;
  }

  public rewriteFrameIndex(request: RequestEnvelope, index: number): string | undefined {
    return replaceValue(request.text, FRAME_PATH, String(index));
  }

  public stateLocation(response: ResponseEnvelope): Location | undefined {
    return this.locationFromState(getPath(response.value, STATE_PATH));
  }

  public detectStop(
    envelope: ResponseEnvelope | EventEnvelope,
    record: RequestRecord | undefined,
  ): StopCandidate | undefined {
    if (envelope.kind !== 'response' || !record) {
      return undefined;
    }
    const verb = this.executionVerb(record.method, record.subcommand);
    if (!verb) {
      return undefined;
    }
    const summary = summarizeState(getPath(envelope.value, STATE_PATH));
    if (!summary) {
      return undefined;
    }
    const candidate: StopCandidate = {
      envelope,
      verb,
      running: summary.running,
      exited: summary.exited,
    };
    const location = this.toLocation(summary);
    if (location) {
      candidate.location = location;
    }
    if (summary.threadId !== undefined) {
      candidate.threadId = summary.threadId;
    }
    return candidate;
  }

  public buildRequest(id: number, method: string, args: unknown): string {
    return JSON.stringify({ id, method, params: [args] });
  }

  /** Location of a raw `DebuggerState` value. */
  public locationFromState(state: unknown): Location | undefined {
    const summary = summarizeState(state);
    return summary ? this.toLocation(summary) : undefined;
  }

  private toLocation(summary: DelveStateSummary): Location | undefined {
    if (!summary.file) {
      return undefined;
    }
    const line = summary.line ?? 0;
    return {
      file: summary.file,
      line,
      function:
        summary.functionName ??
        this.classifier.hintFunction(summary.file, line) ??
        '',
    };
  }
}
