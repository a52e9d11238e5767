export { SQLiteConversationStore } from "./checkpoint-store.js";
export type { SQLiteConversationStoreOptions } from "./checkpoint-store.js";
export { StoredStateSchema, encodeState, decodeState } from "./state-codec.js";
export type { StoredState } from "./state-codec.js";
