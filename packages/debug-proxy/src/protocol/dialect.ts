import { WireMessage } from '../framing/messageFramer';
import { WireFormat } from '../framing/wireFormat';
import { RequestRecord } from '../state/correlationTable';
import { Location } from '../state/locationState';
import {
  Envelope,
  EventEnvelope,
  RequestEnvelope,
  ResponseEnvelope,
} from './envelopes';

export type DialectName = 'json-rpc' | 'dap';

export interface StackFrameSummary {
  file: string;
  line: number;
  function: string;
}

/**
 * A message that reports the debuggee stopping after an execution command.
 * Whether it stopped inside adapter code is decided by the caller.
 */
export interface StopCandidate {
  envelope: ResponseEnvelope | EventEnvelope;
  /** Execution verb that led here (`next`, `continue`, `stepIn`, ...). */
  verb: string | undefined;
  /** Present when the message itself carries the position (JSON-RPC). */
  location?: Location;
  threadId?: number;
  running: boolean;
  exited: boolean;
}

/**
 * Everything that differs between the bare JSON-RPC and the framed DAP
 * protocols. Decoding tries each message shape in a fixed order and yields
 * exactly one envelope variant.
 */
export interface ProtocolDialect {
  readonly name: DialectName;
  readonly format: WireFormat;

  /** Undefined when the body is not valid JSON. */
  decode(message: WireMessage): Envelope | undefined;
  encode(text: string): Buffer;

  /** Execution verb of a step/continue request, else undefined. */
  executionVerb(method: string, subcommand?: string): string | undefined;

  isStackTraceRecord(record: RequestRecord): boolean;
  /** Structural sniffing for stack-trace responses with no correlation entry. */
  looksLikeStackTrace(response: ResponseEnvelope): boolean;
  stackFrames(response: ResponseEnvelope): StackFrameSummary[] | undefined;
  /** Response text with only the first `keep` frames. */
  truncateStackTrace(response: ResponseEnvelope, keep: number): string | undefined;

  /** Frame index addressed by a frame-scoped request. */
  frameIndex(request: RequestEnvelope): number | undefined;
  rewriteFrameIndex(request: RequestEnvelope, index: number): string | undefined;

  /** Position reported by a state-carrying response, if any. */
  stateLocation(response: ResponseEnvelope): Location | undefined;
  detectStop(
    envelope: ResponseEnvelope | EventEnvelope,
    record: RequestRecord | undefined,
    lastExecutionVerb: string | undefined,
  ): StopCandidate | undefined;

  /** Serialises an internal request with a reserved id. */
  buildRequest(id: number, method: string, args: unknown): string;
}
