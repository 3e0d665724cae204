import { AssetRegistry } from "./asset-registry.js";
import { silentLogger, type LedgerLogger } from "./command.js";
import type { EventSink } from "./event-sink.js";
import type { KeyValueBackend } from "./storage/backend.js";
import { UniqueAssetRegistry } from "./unique-asset-registry.js";

export interface LedgerOptions {
  backend: KeyValueBackend;
  sink: EventSink;
  logger?: LedgerLogger;
  /** Prefix for both registries' storage, so several ledgers can share a backend. */
  namespace?: string;
  maxAssetId?: bigint;
  maxUniqueAssetId?: bigint;
}

export interface Ledger {
  assets: AssetRegistry;
  uniques: UniqueAssetRegistry;
}

/** Both registries over one backend and one event sink. */
export function createLedger(options: LedgerOptions): Ledger {
  const logger = options.logger ?? silentLogger();
  const scoped = (registry: string) =>
    options.namespace === undefined ? registry : `${options.namespace}/${registry}`;
  return {
    assets: new AssetRegistry({
      backend: options.backend,
      sink: options.sink,
      logger,
      namespace: scoped("assets"),
      maxAssetId: options.maxAssetId,
    }),
    uniques: new UniqueAssetRegistry({
      backend: options.backend,
      sink: options.sink,
      logger,
      namespace: scoped("uniques"),
      maxAssetId: options.maxUniqueAssetId,
    }),
  };
}
