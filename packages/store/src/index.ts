export { Cipher, type DecryptResult } from "./cipher.js";
export { ConfigurationError, DecryptionError, PersistenceError, SnapshotFormatError, StoreError } from "./errors.js";
export { SnapshotFile, type SnapshotFs, type StoreLogger } from "./persistence.js";
export { SnapshotDocumentSchema, type SnapshotDocument } from "./schema.js";
export { StateModel } from "./state.js";
export {
  GuildStore,
  summarizeResponses,
  type ApplicationAnswers,
  type DecideOutcome,
  type DecisionDetails,
  type GuildStoreOptions,
  type NewCup,
  type SubmissionInput,
  type SubmitOutcome,
  type WithdrawOutcome
} from "./store.js";
