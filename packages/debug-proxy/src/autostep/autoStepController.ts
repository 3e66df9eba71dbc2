import { InternalRequestError } from '../errors';
import { StopCandidate } from '../protocol/dialect';
import { Location } from '../state/locationState';

export interface AutoStepOptions {
  /** Step-over commands issued before giving up. */
  maxSteps: number;
  /** Wait after a step that reported no state or a running debuggee. */
  pollDelayMs: number;
  /** Timeout of each internal request. */
  requestTimeoutMs: number;
}

export const DEFAULT_AUTO_STEP_OPTIONS: Readonly<AutoStepOptions> = {
  maxSteps: 30,
  pollDelayMs: 200,
  requestTimeoutMs: 10000,
};

export type AutoStepOutcome = 'user-code' | 'exhausted' | 'exited' | 'failed';

export interface AutoStepResult {
  /** Bytes sent to the client in place of the suppressed stop message. */
  replacement: Buffer;
  steps: number;
  outcome: AutoStepOutcome;
  location: Location | undefined;
}

/**
 * Steps the debuggee out of adapter code on the client's behalf.
 */
export interface AutoStepController {
  /** Where the stop reported by `candidate` happened. */
  locate(candidate: StopCandidate): Promise<Location | undefined>;
  run(candidate: StopCandidate): Promise<AutoStepResult>;
}

export const STEP_OVER_VERB = 'next';

export function isStepOver(verb: string | undefined): boolean {
  return verb !== undefined && verb.toLowerCase() === STEP_OVER_VERB;
}

/**
 * A closed backend channel ends the run; timeouts and error replies only
 * cost the step.
 */
export function isChannelClosed(error: unknown): boolean {
  return error instanceof InternalRequestError && error.failure === 'closed';
}
