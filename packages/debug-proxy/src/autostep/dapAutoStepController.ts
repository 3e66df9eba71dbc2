import { DebugProtocol } from '@vscode/debugprotocol';
import { setTimeout as delay } from 'timers/promises';
import { CodeClassifier } from '../classify/codeClassifier';
import { errorMessage } from '../errors';
import { replaceValue } from '../framing/jsonSpans';
import { LoggerInterface, childLogger } from '../logging';
import { DapDialect } from '../protocol/dapDialect';
import { StopCandidate } from '../protocol/dialect';
import { arrayAt, numberAt } from '../protocol/json';
import { Location } from '../state/locationState';
import { SessionState } from '../state/sessionState';
import {
  AutoStepController,
  AutoStepOptions,
  AutoStepOutcome,
  AutoStepResult,
  DEFAULT_AUTO_STEP_OPTIONS,
  STEP_OVER_VERB,
  isChannelClosed,
  isStepOver,
} from './autoStepController';
import { BackendChannel } from './backendChannel';

/**
 * Auto-step for DAP backends. Stops arrive as `stopped` events, so each step
 * is a `next` request, the `stopped` event it causes, and a one-frame
 * `stackTrace` to learn where the thread is. The client finally receives its
 * original `stopped` event, pointing at the thread that ended in user code.
 */
export class DapAutoStepController implements AutoStepController {
  private readonly logger: LoggerInterface;
  private readonly options: AutoStepOptions;

  constructor(
    private readonly dialect: DapDialect,
    private readonly channel: BackendChannel,
    private readonly classifier: CodeClassifier,
    private readonly session: SessionState,
    logger: LoggerInterface,
    options: Partial<AutoStepOptions> = {},
  ) {
    this.logger = childLogger(logger, { component: 'DapAutoStepController' });
    this.options = { ...DEFAULT_AUTO_STEP_OPTIONS, ...options };
  }

  public async locate(candidate: StopCandidate): Promise<Location | undefined> {
    try {
      const threadId = candidate.threadId ?? (await this.firstThreadId());
      return threadId === undefined ? undefined : await this.locateThread(threadId);
    } catch (error) {
      this.logger.warn(
        { err: error },
        `Could not locate stopped thread: ${errorMessage(error)}`,
      );
      return undefined;
    }
  }

  public async run(candidate: StopCandidate): Promise<AutoStepResult> {
    const startTime = Date.now();
    let threadId = candidate.threadId ?? (await this.firstThreadIdOrUndefined());
    let location: Location | undefined;
    let outcome: AutoStepOutcome = 'exhausted';
    let steps = 0;

    this.session.stats.autoStepRuns++;
    this.channel.beginCapture();
    try {
      if (threadId === undefined) {
        outcome = 'failed';
      } else {
        for (let step = 1; step <= this.options.maxSteps; step++) {
          const currentThread: number = threadId;
          const stoppedThread = await this.attempt(step, () => this.stepOver(currentThread));
          steps++;
          this.session.stats.autoStepSteps++;
          if (stoppedThread !== undefined) {
            threadId = stoppedThread;
            location = await this.attempt(step, () => this.locateThread(stoppedThread));
          } else {
            location = undefined;
          }
          if (!location) {
            this.logger.debug({ step, threadId }, 'No frame for stopped thread, waiting');
            await delay(this.options.pollDelayMs);
            continue;
          }
          this.session.location.update(location);
          if (this.classifier.isAdapterCode(location.file)) {
            this.logger.debug(
              { step, file: location.file, line: location.line },
              'Still in adapter code',
            );
            continue;
          }

          outcome = 'user-code';
          if (isStepOver(candidate.verb)) {
            const userThread: number = threadId;
            const extraThread = await this.attempt(step, () => this.stepOver(userThread));
            if (extraThread !== undefined) {
              threadId = extraThread;
              steps++;
              this.session.stats.autoStepSteps++;
              const extraLocation = await this.attempt(step, () => this.locateThread(extraThread));
              if (extraLocation) {
                location = this.session.location.update(extraLocation);
              }
            }
          }
          break;
        }
      }
    } catch (error) {
      outcome = 'failed';
      this.logger.warn({ err: error }, `Auto-step aborted: ${errorMessage(error)}`);
    } finally {
      this.channel.endCapture();
    }

    this.logger.info(
      { outcome, steps, durationMs: Date.now() - startTime, file: location?.file, line: location?.line },
      'Auto-step finished',
    );

    return {
      replacement: this.dialect.encode(this.retarget(candidate, threadId)),
      steps,
      outcome,
      location,
    };
  }

  /**
   * Runs one internal exchange. Timeouts and error replies yield undefined;
   * a closed channel is rethrown and ends the run.
   */
  private async attempt<T>(step: number, exchange: () => Promise<T>): Promise<T | undefined> {
    try {
      return await exchange();
    } catch (error) {
      if (isChannelClosed(error)) {
        throw error;
      }
      this.logger.warn({ step, err: error }, `Internal request failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /** Issues `next` and resolves with the thread of the `stopped` event it produced. */
  private async stepOver(threadId: number): Promise<number> {
    const args: DebugProtocol.NextArguments = { threadId };
    const stopped = this.channel.waitForEvent('stopped', this.options.requestTimeoutMs);
    try {
      await this.channel.request(STEP_OVER_VERB, args, this.options.requestTimeoutMs);
    } catch (error) {
      // observe the waiter so its rejection is not left unhandled
      stopped.catch(() => undefined);
      throw error;
    }
    const event = await stopped;
    return numberAt(event.value, ['body', 'threadId']) ?? threadId;
  }

  private async locateThread(threadId: number): Promise<Location | undefined> {
    const args: DebugProtocol.StackTraceArguments = {
      threadId,
      startFrame: 0,
      levels: 1,
    };
    const response = await this.channel.request(
      'stackTrace',
      args,
      this.options.requestTimeoutMs,
    );
    return this.dialect.topFrameLocation(response);
  }

  private async firstThreadId(): Promise<number | undefined> {
    const response = await this.channel.request(
      'threads',
      undefined,
      this.options.requestTimeoutMs,
    );
    const threads = arrayAt(response.value, ['body', 'threads']);
    return threads && threads.length > 0 ? numberAt(threads, [0, 'id']) : undefined;
  }

  private async firstThreadIdOrUndefined(): Promise<number | undefined> {
    try {
      return await this.firstThreadId();
    } catch (error) {
      this.logger.warn({ err: error }, `Could not list threads: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /** The original `stopped` event, moved to `threadId` when stepping changed thread. */
  private retarget(candidate: StopCandidate, threadId: number | undefined): string {
    const text = candidate.envelope.text;
    if (threadId === undefined || threadId === candidate.threadId) {
      return text;
    }
    return replaceValue(text, ['body', 'threadId'], String(threadId)) ?? text;
  }
}
