import type {
  CompactionPayload,
  ConversationAgent,
  ConversationMetadata,
  ConversationState,
  ConversationStore,
  EventBus,
  EventTopic,
  Message,
  StageOutput,
  ThreadId,
  TraceContext,
  TurnFailedPayload,
  TurnResult,
  TurnStartedPayload,
} from "@colloquy/types";
import {
  ContextManager,
  InMemoryEventBus,
  appendValidation,
  createEvent,
  createTraceContext,
  describeError,
  isColloquyError,
  readValidationHistory,
  silentLogger,
  type Logger,
} from "@colloquy/core";

/** What a stage contributes to the running state. */
export interface StateUpdate {
  readonly messages: ReadonlyArray<Message>;
  readonly metadata: ConversationMetadata;
  readonly output: StageOutput;
}

export interface PipelineOptions {
  researcher: ConversationAgent;
  validator: ConversationAgent;
  contextManager: ContextManager;
  store: ConversationStore;
  bus?: EventBus;
  logger?: Logger;
}

export const EMPTY_STATE: ConversationState = { messages: [], metadata: {} };

/** Researcher stage: answer the newest question and append the spoken version. */
export async function runResearchStage(
  agent: ConversationAgent,
  state: ConversationState
): Promise<StateUpdate> {
  const response = await agent.process({ messages: state.messages });
  return {
    messages: [...state.messages, { role: "agent", content: response.audioSummary }],
    metadata: { ...state.metadata, ...response.metadata },
    output: {
      agent: agent.name,
      content: response.content,
      audioSummary: response.audioSummary,
      audio: response.audio,
    },
  };
}

/** Validator stage: score the research and roll the validation window forward. */
export async function runValidationStage(
  agent: ConversationAgent,
  state: ConversationState
): Promise<StateUpdate> {
  const history = readValidationHistory(state.metadata);
  const response = await agent.process({
    messages: state.messages,
    previousValidations: history,
  });

  const { confidenceScore, assessment = "", isValidated = false } = response.metadata;
  const metadata: ConversationMetadata = { ...state.metadata, ...response.metadata };
  return {
    messages: [...state.messages, { role: "agent", content: response.audioSummary }],
    metadata:
      confidenceScore === undefined
        ? metadata
        : {
            ...metadata,
            validationHistory: appendValidation(history, {
              confidenceScore,
              assessment,
              isValidated,
            }),
          },
    output: {
      agent: agent.name,
      content: response.content,
      audioSummary: response.audioSummary,
      audio: response.audio,
    },
  };
}

/**
 * Runs one conversation turn: researcher, then validator, then context
 * compaction, then a single save.
 *
 * Nothing is persisted unless every step succeeds, so a failed turn can be
 * retried as-is. Failures are published as "turn.failed" and rethrown.
 */
export class ResearchValidationPipeline {
  private readonly researcher: ConversationAgent;
  private readonly validator: ConversationAgent;
  private readonly contextManager: ContextManager;
  private readonly store: ConversationStore;
  readonly bus: EventBus;
  private readonly log: Logger;

  constructor(opts: PipelineOptions) {
    this.researcher = opts.researcher;
    this.validator = opts.validator;
    this.contextManager = opts.contextManager;
    this.store = opts.store;
    this.bus = opts.bus ?? new InMemoryEventBus(opts.logger);
    this.log = opts.logger ?? silentLogger;
  }

  async runTurn(threadId: ThreadId, userMessage: string, trace?: TraceContext): Promise<TurnResult> {
    const traceCtx = createTraceContext(trace);
    const log = this.log.withTrace(traceCtx);

    try {
      const prior = (await this.store.load(threadId)) ?? EMPTY_STATE;
      await this.publish<TurnStartedPayload>(
        "turn.started",
        { userMessage, priorMessageCount: prior.messages.length },
        traceCtx,
        threadId
      );

      let state: ConversationState = {
        messages: [...prior.messages, { role: "user", content: userMessage }],
        metadata: prior.metadata,
      };

      const research = await runResearchStage(this.researcher, state);
      state = { messages: research.messages, metadata: research.metadata };
      await this.publish<StageOutput>("stage.complete", research.output, traceCtx, threadId);

      const validation = await runValidationStage(this.validator, state);
      state = { messages: validation.messages, metadata: validation.metadata };
      await this.publish<StageOutput>("stage.complete", validation.output, traceCtx, threadId);

      const outcome = await this.contextManager.manage(state.messages);
      state = { messages: outcome.messages, metadata: state.metadata };
      if (outcome.compacted) {
        await this.publish<CompactionPayload>(
          "context.compacted",
          { summarizedCount: outcome.summarizedCount, keptCount: outcome.messages.length - 1 },
          traceCtx,
          threadId
        );
      }

      await this.store.save(threadId, state);

      const result: TurnResult = {
        threadId,
        state,
        research: research.output,
        validation: validation.output,
        compacted: outcome.compacted,
      };
      log.info("Turn complete", {
        threadId,
        messages: state.messages.length,
        confidenceScore: state.metadata.confidenceScore,
        compacted: outcome.compacted,
      });
      await this.publish<TurnResult>("turn.complete", result, traceCtx, threadId);
      return result;
    } catch (err) {
      log.error("Turn failed", { threadId, error: describeError(err) });
      await this.publish<TurnFailedPayload>(
        "turn.failed",
        {
          error: describeError(err),
          ...(isColloquyError(err) ? { code: err.code } : {}),
        },
        traceCtx,
        threadId
      );
      throw err;
    }
  }

  private publish<T>(
    topic: EventTopic,
    payload: T,
    traceCtx: TraceContext,
    threadId: ThreadId
  ): Promise<void> {
    return this.bus.publish(createEvent(topic, payload, traceCtx, threadId));
  }
}
