import { WireMessage } from '../framing/messageFramer';

interface EnvelopeBase {
  message: WireMessage;
  /** Body decoded as UTF-8; rewrites splice this text. */
  text: string;
  /** Parsed body. Only read from; never re-serialised. */
  value: unknown;
}

export interface RequestEnvelope extends EnvelopeBase {
  kind: 'request';
  /** Normalised id (JSON-RPC `id`, DAP `seq`). */
  id: string;
  method: string;
  subcommand?: string;
}

export interface ResponseEnvelope extends EnvelopeBase {
  kind: 'response';
  /** Normalised id of the request this answers (JSON-RPC `id`, DAP `request_seq`). */
  id: string;
  /** DAP responses name their command; JSON-RPC responses do not. */
  command?: string;
  success: boolean;
}

export interface EventEnvelope extends EnvelopeBase {
  kind: 'event';
  event: string;
}

/** Valid JSON that matches no known message shape. Passed through as is. */
export interface RawEnvelope extends EnvelopeBase {
  kind: 'raw';
}

export type Envelope =
  | RequestEnvelope
  | ResponseEnvelope
  | EventEnvelope
  | RawEnvelope;
