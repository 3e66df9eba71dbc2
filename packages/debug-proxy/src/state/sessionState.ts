import { CorrelationTable } from './correlationTable';
import { FrameMap } from './frameMap';
import { LocationState } from './locationState';

export interface SessionStats {
  requests: number;
  responses: number;
  rewrittenRequests: number;
  filteredStackTraces: number;
  suppressedInternalResponses: number;
  droppedMessages: number;
  autoStepRuns: number;
  autoStepSteps: number;
}

export function emptyStats(): SessionStats {
  return {
    requests: 0,
    responses: 0,
    rewrittenRequests: 0,
    filteredStackTraces: 0,
    suppressedInternalResponses: 0,
    droppedMessages: 0,
    autoStepRuns: 0,
    autoStepSteps: 0,
  };
}

/**
 * Everything one client connection knows about its debug session.
 */
export class SessionState {
  public readonly correlation = new CorrelationTable();
  public readonly frames = new FrameMap();
  public readonly location = new LocationState();
  public readonly stats: SessionStats = emptyStats();
  /** Last execution command the client issued (step/continue family). */
  public lastExecutionVerb: string | undefined;

  constructor(public readonly sessionId: string) {}
}
