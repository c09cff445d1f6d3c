import type { ReadonlyChannel } from '../utils/channel.js';

/**
 * A file-backed secret whose value can be observed for changes.
 */
export interface Secret {
  readonly id: string;
  readonly path: string;
  value(): string;
  /**
   * A new dedicated channel of updated values. The channel is closed once
   * the secret is no longer watched, whether through close or an error.
   */
  listenChanges(): Promise<ReadonlyChannel<string>>;
  isClosed(): boolean;
  lastError(): Error | undefined;
}

export interface SecretRegistry {
  getSecret(secretKey: string): Promise<Secret>;
  listSecretKeys(): Promise<readonly string[]>;
  getBasePath(): string;
  isClosed(): boolean;
  lastError(): Error | undefined;
  close(): Promise<void>;
  /** Settles once the dispatch loop has stopped and shutdown has finished. */
  whenClosed(): Promise<void>;
}
