import { arrayAt, getPath, isRecord, numberAt, stringAt } from './json';

export const DelveMethod = {
  Command: 'RPCServer.Command',
  Stacktrace: 'RPCServer.Stacktrace',
  State: 'RPCServer.State',
  Eval: 'RPCServer.Eval',
  ListLocalVars: 'RPCServer.ListLocalVars',
  ListFunctionArgs: 'RPCServer.ListFunctionArgs',
} as const;

/** Requests whose `params[0].Scope.Frame` selects a stack frame. */
export const FRAME_SCOPED_METHODS: ReadonlySet<string> = new Set([
  DelveMethod.Eval,
  DelveMethod.ListLocalVars,
  DelveMethod.ListFunctionArgs,
]);

/** `RPCServer.Command` names that resume the debuggee. Lower-cased. */
export const EXECUTION_COMMANDS: ReadonlySet<string> = new Set([
  'continue',
  'next',
  'step',
  'stepout',
  'stepinstruction',
  'rewind',
  'reversenext',
  'reversestep',
  'reversestepout',
  'reversestepinstruction',
]);

/**
 * The parts of a Delve `DebuggerState` the proxy reads.
 */
export interface DelveStateSummary {
  running: boolean;
  exited: boolean;
  file?: string;
  line?: number;
  /** Best function name the state itself offers. */
  functionName?: string;
  threadId?: number;
}

function functionName(value: unknown, path: ReadonlyArray<string | number>): string | undefined {
  const name = stringAt(value, [...path, 'function', 'name']);
  return name ? name : undefined;
}

/**
 * Reads a `DebuggerState` object (the `State` member of a command or state
 * reply). Undefined when `state` is not an object.
 */
export function summarizeState(state: unknown): DelveStateSummary | undefined {
  if (!isRecord(state)) {
    return undefined;
  }
  const summary: DelveStateSummary = {
    running: state.Running === true,
    exited: state.exited === true,
  };

  const thread = getPath(state, ['currentThread']);
  const goroutineLoc = getPath(state, ['currentGoroutine', 'currentLoc']);

  const file = stringAt(thread, ['file']) || stringAt(goroutineLoc, ['file']);
  if (file) {
    summary.file = file;
  }
  const line = numberAt(thread, ['line']) ?? numberAt(goroutineLoc, ['line']);
  if (line !== undefined) {
    summary.line = line;
  }
  const threadId = numberAt(thread, ['id']);
  if (threadId !== undefined) {
    summary.threadId = threadId;
  }

  const breakpointStack = arrayAt(thread, ['breakPointInfo', 'stacktrace']);
  const name =
    (breakpointStack && breakpointStack.length > 0
      ? functionName(breakpointStack, [0])
      : undefined) ??
    functionName(goroutineLoc, []) ??
    functionName(thread, []);
  if (name) {
    summary.functionName = name;
  }
  return summary;
}
