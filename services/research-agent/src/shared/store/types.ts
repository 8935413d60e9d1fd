/**
 * Store Types
 */

/**
 * Keyed JSON documents. Keys are "/"-separated; callers validate what they read.
 */
export interface IStore {
  /** null when the key is absent */
  read(key: string): Promise<unknown>;

  /** Replaces any previous value; resolves once the write is durable */
  write(key: string, data: unknown): Promise<void>;

  exists(key: string): Promise<boolean>;

  /** false when nothing was stored under the key */
  delete(key: string): Promise<boolean>;

  /** Sorted keys starting with the prefix */
  list(prefix?: string): Promise<string[]>;
}
