import { SaturatingIdAllocator } from "./allocator.js";
import { BalanceLedger } from "./balance-ledger.js";
import { CommandExecutor, silentLogger, type LedgerLogger } from "./command.js";
import type { EventSink } from "./event-sink.js";
import { ensureOwner } from "./ownership.js";
import { err, ok, type Result } from "./result.js";
import type { Sellable } from "./sellable.js";
import type { KeyValueBackend } from "./storage/backend.js";
import {
  accountKey,
  assetDetailsValue,
  assetIdKey,
  assetMetadataValue,
  u128Value,
} from "./storage/codec.js";
import { StorageDoubleMap, StorageMap, StorageValue } from "./storage/maps.js";
import { assertU128, MAX_U128, saturatingAdd, saturatingSub } from "./u128.js";
import type {
  AccountId,
  AssetDetails,
  AssetId,
  AssetMetadata,
  CommandResult,
  Holding,
  SupplyAudit,
} from "./types.js";

export interface RegistryOptions {
  backend: KeyValueBackend;
  sink: EventSink;
  logger?: LedgerLogger;
  /** Storage namespace prefix; lets several registries share one backend. */
  namespace?: string;
  /** Largest id the allocator may hand out. */
  maxAssetId?: bigint;
}

export interface MintOutcome {
  assetId: AssetId;
  totalSupply: bigint;
  minted: bigint;
}

export interface BurnOutcome {
  assetId: AssetId;
  totalSupply: bigint;
  burned: bigint;
}

export interface TransferOutcome {
  assetId: AssetId;
  transferred: bigint;
}

/**
 * Fungible assets. Any signed account can create an asset and becomes its
 * owner; only the owner can mint or set metadata. Burning and transferring
 * act on the caller's own balance and clamp to it instead of failing.
 *
 * Ids come from a saturating allocator: once the nonce reaches `maxAssetId`
 * each further `create` is handed that same id and replaces its record.
 */
export class AssetRegistry {
  private readonly assets: StorageMap<AssetId, AssetDetails>;
  private readonly metadataRecords: StorageMap<AssetId, AssetMetadata>;
  private readonly balances: BalanceLedger;
  private readonly allocator: SaturatingIdAllocator;
  private readonly executor: CommandExecutor;

  constructor(options: RegistryOptions) {
    const { backend } = options;
    const prefix = options.namespace ?? "assets";
    this.assets = new StorageMap(backend, `${prefix}/asset`, assetIdKey, assetDetailsValue);
    this.metadataRecords = new StorageMap(
      backend,
      `${prefix}/metadata`,
      assetIdKey,
      assetMetadataValue,
    );
    this.balances = new BalanceLedger(
      new StorageDoubleMap(backend, `${prefix}/account`, assetIdKey, accountKey, u128Value, 0n),
    );
    this.allocator = new SaturatingIdAllocator(
      new StorageValue(backend, `${prefix}/nonce`, u128Value, 0n),
      options.maxAssetId ?? MAX_U128,
    );
    this.executor = new CommandExecutor(backend, options.sink, options.logger ?? silentLogger());
  }

  create(caller: AccountId): CommandResult<AssetId, never> {
    return this.executor.execute("assets.create", caller, (scope) => {
      const assetId = this.allocator.next();
      this.assets.insert(assetId, { owner: caller, supply: 0n });
      scope.emit({ registry: "assets", type: "Created", assetId, owner: caller });
      return assetId;
    });
  }

  setMetadata(
    caller: AccountId,
    assetId: AssetId,
    name: Uint8Array,
    symbol: Uint8Array,
  ): CommandResult<AssetId, "Unknown" | "NoPermission"> {
    assertU128(assetId, "assetId");
    return this.executor.execute("assets.setMetadata", caller, (scope) => {
      scope.unwrap(ensureOwner(this.assets.get(assetId), caller));
      this.metadataRecords.insert(assetId, { name, symbol });
      scope.emit({ registry: "assets", type: "MetadataSet", assetId, name, symbol });
      return assetId;
    });
  }

  /**
   * Supply grows by saturating addition; `to` is credited with the growth that
   * actually happened, which is less than `amount` when the supply saturates.
   */
  mint(
    caller: AccountId,
    assetId: AssetId,
    amount: bigint,
    to: AccountId,
  ): CommandResult<MintOutcome, "Unknown" | "NoPermission"> {
    assertU128(assetId, "assetId");
    assertU128(amount, "amount");
    return this.executor.execute("assets.mint", caller, (scope) => {
      scope.unwrap(ensureOwner(this.assets.get(assetId), caller));

      let minted = 0n;
      const details = scope.unwrap(
        this.assets.tryMutate(assetId, (current): Result<AssetDetails, "Unknown"> => {
          if (!current) return err("Unknown");
          const supply = saturatingAdd(current.supply, amount);
          minted = supply - current.supply;
          return ok({ ...current, supply });
        }),
      );
      this.balances.credit(assetId, to, minted);

      scope.emit({
        registry: "assets",
        type: "Minted",
        assetId,
        owner: to,
        totalSupply: details.supply,
      });
      return { assetId, totalSupply: details.supply, minted };
    });
  }

  burn(
    caller: AccountId,
    assetId: AssetId,
    amount: bigint,
  ): CommandResult<BurnOutcome, "Unknown"> {
    assertU128(assetId, "assetId");
    assertU128(amount, "amount");
    return this.executor.execute("assets.burn", caller, (scope) => {
      const current = this.assets.get(assetId) ?? scope.reject("Unknown");
      const burned = this.balances.debit(assetId, caller, amount);
      const totalSupply = saturatingSub(current.supply, burned);
      this.assets.insert(assetId, { ...current, supply: totalSupply });

      scope.emit({ registry: "assets", type: "Burned", assetId, owner: caller, totalSupply });
      return { assetId, totalSupply, burned };
    });
  }

  transfer(
    caller: AccountId,
    assetId: AssetId,
    amount: bigint,
    to: AccountId,
  ): CommandResult<TransferOutcome, "Unknown"> {
    assertU128(assetId, "assetId");
    assertU128(amount, "amount");
    return this.executor.execute("assets.transfer", caller, (scope) => {
      if (!this.assets.contains(assetId)) scope.reject("Unknown");

      const transferred = this.balances.debit(assetId, caller, amount);
      this.balances.credit(assetId, to, transferred);

      scope.emit({
        registry: "assets",
        type: "Transferred",
        assetId,
        from: caller,
        to,
        amount: transferred,
        requested: amount,
      });
      return { assetId, transferred };
    });
  }

  asset(assetId: AssetId): AssetDetails | undefined {
    return this.assets.get(assetId);
  }

  metadata(assetId: AssetId): AssetMetadata | undefined {
    return this.metadataRecords.get(assetId);
  }

  balanceOf(assetId: AssetId, account: AccountId): bigint {
    return this.balances.balanceOf(assetId, account);
  }

  holders(assetId: AssetId): Holding[] {
    return this.balances.holders(assetId);
  }

  /** Id the next `create` will receive. */
  nonce(): AssetId {
    return this.allocator.peek();
  }

  audit(assetId: AssetId): SupplyAudit | undefined {
    const details = this.assets.get(assetId);
    if (!details) return undefined;
    const holdings = this.balances.total(assetId);
    return { assetId, supply: details.supply, holdings, consistent: holdings === details.supply };
  }

  /** Runs the transfer command with `from` as caller; moves nothing for unknown assets. */
  sellable(): Sellable<AccountId, AssetId> {
    return {
      amountOwned: (assetId, account) => this.balances.balanceOf(assetId, account),
      transfer: (assetId, from, to, amount) => {
        const result = this.transfer(from, assetId, amount, to);
        return result.ok ? result.value.transferred : 0n;
      },
    };
  }
}
