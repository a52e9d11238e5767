import type {
  AgentInput,
  AgentResponse,
  ConversationAgent,
  LanguageModel,
  SpeechSynthesizer,
} from "@colloquy/types";
import { assertValidScore, describeScoreChange, silentLogger, type Logger } from "@colloquy/core";
import {
  VALIDATION_SYSTEM_PROMPT,
  VALIDATOR_SPOKEN_SYSTEM_PROMPT,
  validationUserPrompt,
  validatorSpokenUserPrompt,
} from "./prompts/index.js";
import { ValidationResultSchema } from "./schemas.js";
import { lastContent } from "./transcript.js";
import { toAudio } from "./speech.js";

export const DEFAULT_CONFIDENCE_THRESHOLD = 70;

export interface ValidatorAgentOptions {
  llm: LanguageModel;
  speech: SpeechSynthesizer;
  confidenceThreshold?: number;
  logger?: Logger;
}

/**
 * Scores the latest research against the question, taking the last two
 * validation outcomes into account so later answers can earn a higher score.
 */
export class ValidatorAgent implements ConversationAgent {
  readonly name = "validator" as const;
  readonly confidenceThreshold: number;
  private readonly llm: LanguageModel;
  private readonly speech: SpeechSynthesizer;
  private readonly log: Logger;

  constructor(opts: ValidatorAgentOptions) {
    this.llm = opts.llm;
    this.speech = opts.speech;
    this.confidenceThreshold = opts.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    this.log = opts.logger ?? silentLogger;
  }

  async process({ messages, previousValidations = [] }: AgentInput): Promise<AgentResponse> {
    const query = lastContent(messages, "user");
    const research = lastContent(messages, "agent");

    this.log.debug("Validating research", { previousValidations: previousValidations.length });
    const { confidenceScore, assessment } = await this.llm.generateStructured(
      VALIDATION_SYSTEM_PROMPT,
      validationUserPrompt(query, research, messages, previousValidations),
      ValidationResultSchema,
      "ValidationResult"
    );
    assertValidScore(confidenceScore);

    const previousScore = previousValidations[previousValidations.length - 1]?.confidenceScore;
    this.log.info("Validation scored", {
      confidenceScore,
      previousScore,
      change: describeScoreChange(previousValidations, confidenceScore),
    });

    const audioSummary = await this.llm.generate(
      `${VALIDATOR_SPOKEN_SYSTEM_PROMPT}\n\n${validatorSpokenUserPrompt(
        query,
        assessment,
        confidenceScore,
        messages
      )}`
    );
    const audio = toAudio(await this.speech.synthesize(audioSummary));

    return {
      content: assessment,
      audioSummary,
      audio,
      metadata: {
        agent: "validator",
        query,
        confidenceScore,
        assessment,
        isValidated: confidenceScore >= this.confidenceThreshold,
      },
    };
  }
}
