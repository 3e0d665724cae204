import type { Result } from "../result.js";
import type { KeyValueBackend } from "./backend.js";
import type { Codec } from "./codec.js";

const KEY_SEPARATOR = ":";

/** Optional-valued map: absent keys read as `undefined`. */
export class StorageMap<K, V> {
  constructor(
    private readonly backend: KeyValueBackend,
    readonly namespace: string,
    private readonly keyCodec: Codec<K>,
    private readonly valueCodec: Codec<V>,
  ) {}

  get(key: K): V | undefined {
    const raw = this.backend.get(this.namespace, this.keyCodec.encode(key));
    return raw === undefined ? undefined : this.valueCodec.decode(raw);
  }

  contains(key: K): boolean {
    return this.backend.get(this.namespace, this.keyCodec.encode(key)) !== undefined;
  }

  insert(key: K, value: V): void {
    this.backend.put(this.namespace, this.keyCodec.encode(key), this.valueCodec.encode(value));
  }

  mutate(key: K, fn: (current: V | undefined) => V): V {
    const next = fn(this.get(key));
    this.insert(key, next);
    return next;
  }

  /** Writes only when `fn` succeeds. */
  tryMutate<E>(key: K, fn: (current: V | undefined) => Result<V, E>): Result<V, E> {
    const outcome = fn(this.get(key));
    if (outcome.ok) this.insert(key, outcome.value);
    return outcome;
  }
}

/** Map keyed by a pair; absent entries read as the default value. */
export class StorageDoubleMap<K1, K2, V> {
  constructor(
    private readonly backend: KeyValueBackend,
    readonly namespace: string,
    private readonly firstKey: Codec<K1>,
    private readonly secondKey: Codec<K2>,
    private readonly valueCodec: Codec<V>,
    private readonly defaultValue: V,
  ) {}

  get(first: K1, second: K2): V {
    const raw = this.backend.get(this.namespace, this.key(first, second));
    return raw === undefined ? this.defaultValue : this.valueCodec.decode(raw);
  }

  insert(first: K1, second: K2, value: V): void {
    this.backend.put(this.namespace, this.key(first, second), this.valueCodec.encode(value));
  }

  mutate(first: K1, second: K2, fn: (current: V) => V): V {
    const next = fn(this.get(first, second));
    this.insert(first, second, next);
    return next;
  }

  tryMutate<E>(first: K1, second: K2, fn: (current: V) => Result<V, E>): Result<V, E> {
    const outcome = fn(this.get(first, second));
    if (outcome.ok) this.insert(first, second, outcome.value);
    return outcome;
  }

  /** Every written entry under `first`, ordered by encoded second key. */
  entries(first: K1): Array<[K2, V]> {
    const prefix = this.firstKey.encode(first) + KEY_SEPARATOR;
    return this.backend.scan(this.namespace, prefix).map((entry): [K2, V] => [
      this.secondKey.decode(entry.key.slice(prefix.length)),
      this.valueCodec.decode(entry.value),
    ]);
  }

  private key(first: K1, second: K2): string {
    return this.firstKey.encode(first) + KEY_SEPARATOR + this.secondKey.encode(second);
  }
}

/** Single value with a default, stored under a fixed key. */
export class StorageValue<V> {
  private static readonly KEY = "value";

  constructor(
    private readonly backend: KeyValueBackend,
    readonly namespace: string,
    private readonly valueCodec: Codec<V>,
    private readonly defaultValue: V,
  ) {}

  get(): V {
    const raw = this.backend.get(this.namespace, StorageValue.KEY);
    return raw === undefined ? this.defaultValue : this.valueCodec.decode(raw);
  }

  set(value: V): void {
    this.backend.put(this.namespace, StorageValue.KEY, this.valueCodec.encode(value));
  }
}
