import { setTimeout as delay } from 'timers/promises';
import { CodeClassifier } from '../classify/codeClassifier';
import { errorMessage } from '../errors';
import { locateValue } from '../framing/jsonSpans';
import { LoggerInterface, childLogger } from '../logging';
import { DelveMethod, summarizeState } from '../protocol/delveTypes';
import { StopCandidate } from '../protocol/dialect';
import { getPath } from '../protocol/json';
import { JsonRpcDialect } from '../protocol/jsonRpcDialect';
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

const STATE_PATH = ['result', 'State'];

interface StepReply {
  state: unknown;
  stateText: string | undefined;
}

function rawSlice(text: string, path: ReadonlyArray<string | number>): string | undefined {
  const span = locateValue(text, path);
  return span ? text.slice(span.start, span.end) : undefined;
}

/**
 * Auto-step for Delve's JSON-RPC API. The client's suppressed command reply
 * is replaced by a reply carrying the final `DebuggerState`, under the
 * client's original request id.
 */
export class JsonRpcAutoStepController implements AutoStepController {
  private readonly logger: LoggerInterface;
  private readonly options: AutoStepOptions;

  constructor(
    private readonly dialect: JsonRpcDialect,
    private readonly channel: BackendChannel,
    private readonly classifier: CodeClassifier,
    private readonly session: SessionState,
    logger: LoggerInterface,
    options: Partial<AutoStepOptions> = {},
  ) {
    this.logger = childLogger(logger, { component: 'JsonRpcAutoStepController' });
    this.options = { ...DEFAULT_AUTO_STEP_OPTIONS, ...options };
  }

  public async locate(candidate: StopCandidate): Promise<Location | undefined> {
    return candidate.location;
  }

  public async run(candidate: StopCandidate): Promise<AutoStepResult> {
    const startTime = Date.now();
    const responseId = rawSlice(candidate.envelope.text, ['id']) ?? 'null';
    let lastState = rawSlice(candidate.envelope.text, STATE_PATH) ?? 'null';
    let location = candidate.location;
    let outcome: AutoStepOutcome = 'exhausted';
    let steps = 0;

    this.session.stats.autoStepRuns++;
    this.logger.info(
      { verb: candidate.verb, file: location?.file, line: location?.line },
      'Stopped in adapter code, stepping back to user code',
    );

    for (let step = 1; step <= this.options.maxSteps; step++) {
      let reply: StepReply;
      try {
        reply = await this.stepOver();
      } catch (error) {
        if (isChannelClosed(error)) {
          this.logger.warn({ step }, `Auto-step aborted: ${errorMessage(error)}`);
          outcome = 'failed';
          break;
        }
        steps++;
        this.session.stats.autoStepSteps++;
        this.logger.warn({ step, err: error }, `Step-over failed: ${errorMessage(error)}`);
        await delay(this.options.pollDelayMs);
        continue;
      }
      steps++;
      this.session.stats.autoStepSteps++;
      const summary = summarizeState(reply.state);
      if (summary && reply.stateText) {
        lastState = reply.stateText;
      }
      if (!summary || summary.running) {
        this.logger.debug({ step }, 'No stopped state yet, waiting');
        await delay(this.options.pollDelayMs);
        continue;
      }
      if (summary.exited) {
        outcome = 'exited';
        break;
      }

      location = this.dialect.locationFromState(reply.state);
      if (location) {
        this.session.location.update(location);
      }
      if (location && this.classifier.isAdapterCode(location.file)) {
        this.logger.debug(
          { step, file: location.file, line: location.line, function: location.function },
          'Still in adapter code',
        );
        continue;
      }

      outcome = 'user-code';
      if (isStepOver(candidate.verb)) {
        // The user asked to step over; land on the next user line, not the call site.
        try {
          const extra = await this.stepOver();
          steps++;
          this.session.stats.autoStepSteps++;
          if (summarizeState(extra.state) && extra.stateText) {
            lastState = extra.stateText;
          }
          const extraLocation = this.dialect.locationFromState(extra.state);
          if (extraLocation) {
            location = this.session.location.update(extraLocation);
          }
        } catch (error) {
          this.logger.warn({ err: error }, `Final step-over failed: ${errorMessage(error)}`);
        }
      }
      break;
    }

    this.logger.info(
      {
        outcome,
        steps,
        durationMs: Date.now() - startTime,
        file: location?.file,
        line: location?.line,
      },
      'Auto-step finished',
    );

    return {
      replacement: this.dialect.encode(
        `{"id":${responseId},"result":{"State":${lastState}},"error":null}`,
      ),
      steps,
      outcome,
      location,
    };
  }

  private async stepOver(): Promise<StepReply> {
    const reply = await this.channel.request(
      DelveMethod.Command,
      { name: STEP_OVER_VERB },
      this.options.requestTimeoutMs,
    );
    return {
      state: getPath(reply.value, STATE_PATH),
      stateText: rawSlice(reply.text, STATE_PATH),
    };
  }
}
