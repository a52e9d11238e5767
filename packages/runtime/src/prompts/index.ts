export { conversationContextLines } from "./context.js";
export {
  RESEARCH_SYNTHESIS_SYSTEM_PROMPT,
  RESEARCHER_SPOKEN_SYSTEM_PROMPT,
  researchSynthesisUserPrompt,
  researcherSpokenUserPrompt,
} from "./researcher.js";
export {
  VALIDATION_SYSTEM_PROMPT,
  VALIDATOR_SPOKEN_SYSTEM_PROMPT,
  validationUserPrompt,
  validatorSpokenUserPrompt,
} from "./validator.js";
