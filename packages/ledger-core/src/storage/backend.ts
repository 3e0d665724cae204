export interface KeyValueEntry {
  key: string;
  value: string;
}

/**
 * Raw string store partitioned by namespace. Keys handed to `scan` and `put`
 * are already encoded; `scan` returns entries ordered by key.
 *
 * `transaction` runs `fn` atomically: if it throws, every `put` made inside it
 * is undone and the error is rethrown.
 */
export interface KeyValueBackend {
  get(namespace: string, key: string): string | undefined;
  put(namespace: string, key: string, value: string): void;
  scan(namespace: string, prefix: string): KeyValueEntry[];
  transaction<T>(fn: () => T): T;
  close(): void;
}
