export class StoreError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid secret key, unreadable settings. Fatal at startup. */
export class ConfigurationError extends StoreError {}

/** Ciphertext present but not authentic under the configured key. Fatal at startup. */
export class DecryptionError extends StoreError {}

/** Decrypted snapshot is not a valid state document. Fatal at startup. */
export class SnapshotFormatError extends StoreError {}

/** Writing the snapshot failed. The file on disk is unchanged; the caller may retry. */
export class PersistenceError extends StoreError {}
