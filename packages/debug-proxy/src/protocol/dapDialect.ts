import { DebugProtocol } from '@vscode/debugprotocol';
import { locateValue, replaceValue, truncateArray } from '../framing/jsonSpans';
import { WireMessage } from '../framing/messageFramer';
import { encodeFrame } from '../framing/wireFormat';
import { RequestRecord } from '../state/correlationTable';
import { Location } from '../state/locationState';
import { normalizeId } from '../state/normalizeId';
import { ProtocolDialect, StackFrameSummary, StopCandidate } from './dialect';
import {
  Envelope,
  EventEnvelope,
  RequestEnvelope,
  ResponseEnvelope,
} from './envelopes';
import { arrayAt, isRecord, numberAt, stringAt, tryParseJson } from './json';

export const DAP_EXECUTION_COMMANDS: ReadonlySet<string> = new Set([
  'next',
  'stepIn',
  'stepOut',
  'continue',
  'stepBack',
  'reverseContinue',
]);

/** `stopped` reasons that follow from running code, as opposed to pauses or exceptions. */
export const AUTO_STEP_STOP_REASONS: ReadonlySet<string> = new Set<
  DebugProtocol.StoppedEvent['body']['reason']
>([
  'step',
  'breakpoint',
  'function breakpoint',
  'data breakpoint',
  'instruction breakpoint',
  'goto',
]);

const STACK_FRAMES_PATH = ['body', 'stackFrames'];

/**
 * Debug Adapter Protocol over Content-Length framing.
 *
 * DAP frame ids are opaque handles issued by the backend. Dropping a suffix
 * of frames leaves the remaining handles valid, so no request needs its
 * frame reference rewritten.
 */
export class DapDialect implements ProtocolDialect {
  public readonly name = 'dap';
  public readonly format = 'framed';

  public decode(message: WireMessage): Envelope | undefined {
    const text = message.body.toString('utf8');
    const parsed = tryParseJson(text);
    if (!parsed.ok) {
      return undefined;
    }
    const value = parsed.value;
    if (!isRecord(value)) {
      return { kind: 'raw', message, text, value };
    }
    if (value.type === 'request' && typeof value.command === 'string') {
      return {
        kind: 'request',
        id: normalizeId(value.seq),
        method: value.command,
        message,
        text,
        value,
      };
    }
    if (value.type === 'response') {
      const response: ResponseEnvelope = {
        kind: 'response',
        id: normalizeId(value.request_seq),
        success: value.success === true,
        message,
        text,
        value,
      };
      if (typeof value.command === 'string') {
        response.command = value.command;
      }
      return response;
    }
    if (value.type === 'event' && typeof value.event === 'string') {
      return { kind: 'event', event: value.event, message, text, value };
    }
    return { kind: 'raw', message, text, value };
  }

  public encode(text: string): Buffer {
    return encodeFrame('framed', text);
  }

  public executionVerb(method: string): string | undefined {
    return DAP_EXECUTION_COMMANDS.has(method) ? method : undefined;
  }

  public isStackTraceRecord(record: RequestRecord): boolean {
    return record.method === 'stackTrace';
  }

  public looksLikeStackTrace(response: ResponseEnvelope): boolean {
    return (
      response.command === 'stackTrace' ||
      arrayAt(response.value, STACK_FRAMES_PATH) !== undefined
    );
  }

  public stackFrames(response: ResponseEnvelope): StackFrameSummary[] | undefined {
    const frames = arrayAt(response.value, STACK_FRAMES_PATH);
    return frames?.map((frame) => ({
      file: stringAt(frame, ['source', 'path']) ?? '',
      line: numberAt(frame, ['line']) ?? 0,
      function: stringAt(frame, ['name']) ?? '',
    }));
  }

  public truncateStackTrace(response: ResponseEnvelope, keep: number): string | undefined {
    const truncated = truncateArray(response.text, STACK_FRAMES_PATH, keep);
    if (truncated === undefined || !locateValue(truncated, ['body', 'totalFrames'])) {
      return truncated;
    }
    return replaceValue(truncated, ['body', 'totalFrames'], String(keep));
  }

  public frameIndex(): number | undefined {
    return undefined;
  }

  public rewriteFrameIndex(): string | undefined {
    return undefined;
  }

  public stateLocation(): Location | undefined {
    return undefined;
  }

  public detectStop(
    envelope: ResponseEnvelope | EventEnvelope,
    _record: RequestRecord | undefined,
    lastExecutionVerb: string | undefined,
  ): StopCandidate | undefined {
    if (envelope.kind !== 'event' || envelope.event !== 'stopped') {
      return undefined;
    }
    const reason = stringAt(envelope.value, ['body', 'reason']);
    if (!lastExecutionVerb || !reason || !AUTO_STEP_STOP_REASONS.has(reason)) {
      return undefined;
    }
    const candidate: StopCandidate = {
      envelope,
      verb: lastExecutionVerb,
      running: false,
      exited: false,
    };
    const threadId = numberAt(envelope.value, ['body', 'threadId']);
    if (threadId !== undefined) {
      candidate.threadId = threadId;
    }
    return candidate;
  }

  public buildRequest(id: number, method: string, args: unknown): string {
    const request: DebugProtocol.Request = {
      seq: id,
      type: 'request',
      command: method,
      arguments: args,
    };
    return JSON.stringify(request);
  }

  /** Location of the top frame in a `stackTrace` response. */
  public topFrameLocation(response: ResponseEnvelope): Location | undefined {
    const top = this.stackFrames(response)?.[0];
    if (!top || !top.file) {
      return undefined;
    }
    return { file: top.file, line: top.line, function: top.function };
  }
}
