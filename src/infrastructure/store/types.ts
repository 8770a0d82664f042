/**
 * Durable key/value byte store backing variables.
 *
 * `get` resolves `null` for a missing key; any other failure rejects.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  /** All keys starting with `prefix`, in no particular order. */
  keys(prefix: string): Promise<string[]>;
}
