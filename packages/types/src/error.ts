/**
 * Error codes carried by every ColloquyError.
 * Uses a string union so callers can switch exhaustively.
 */
export type ColloquyErrorCode =
  | "COLLABORATOR_ERROR"      // Search/LLM/TTS provider unreachable or returned an error
  | "STRUCTURED_OUTPUT_ERROR" // LLM reply was empty or failed schema validation
  | "CONTRACT_VIOLATION"      // Collaborator returned a value outside its contract (e.g. score > 100)
  | "PERSISTENCE_ERROR"       // Stored state could not be read or written
  | "CONFIG_ERROR"            // Configuration file or environment is invalid
  | "INTERNAL_ERROR";         // Unexpected system failure
