import { CheckedIdAllocator } from "./allocator.js";
import type { RegistryOptions } from "./asset-registry.js";
import { BalanceLedger } from "./balance-ledger.js";
import { CommandExecutor, silentLogger } from "./command.js";
import type { Sellable } from "./sellable.js";
import { accountKey, assetIdKey, u128Value, uniqueAssetDetailsValue } from "./storage/codec.js";
import { StorageDoubleMap, StorageMap, StorageValue } from "./storage/maps.js";
import { assertU128, MAX_U128, minU128, saturatingSub } from "./u128.js";
import type {
  AccountId,
  AssetId,
  CommandResult,
  Holding,
  SupplyAudit,
  UniqueAssetDetails,
} from "./types.js";

export interface UniqueMintOutcome {
  assetId: AssetId;
  supply: bigint;
}

export interface UniqueBurnOutcome {
  assetId: AssetId;
  totalSupply: bigint;
  burned: bigint;
}

export interface UniqueTransferOutcome {
  assetId: AssetId;
  transferred: bigint;
}

/**
 * Creator-minted resources. The creator receives the whole initial supply;
 * holders may burn or transfer what they own, with requests above their
 * balance clamped to it. Balances are keyed by the asset being acted on.
 */
export class UniqueAssetRegistry {
  private readonly assets: StorageMap<AssetId, UniqueAssetDetails>;
  private readonly balances: BalanceLedger;
  private readonly allocator: CheckedIdAllocator;
  private readonly executor: CommandExecutor;

  constructor(options: RegistryOptions) {
    const { backend } = options;
    const prefix = options.namespace ?? "uniques";
    this.assets = new StorageMap(backend, `${prefix}/asset`, assetIdKey, uniqueAssetDetailsValue);
    this.balances = new BalanceLedger(
      new StorageDoubleMap(backend, `${prefix}/account`, assetIdKey, accountKey, u128Value, 0n),
    );
    this.allocator = new CheckedIdAllocator(
      new StorageValue(backend, `${prefix}/nonce`, u128Value, 0n),
      options.maxAssetId ?? MAX_U128,
    );
    this.executor = new CommandExecutor(backend, options.sink, options.logger ?? silentLogger());
  }

  mint(
    caller: AccountId,
    metadata: Uint8Array,
    supply: bigint,
  ): CommandResult<UniqueMintOutcome, "NoSupply" | "TypeOverflow"> {
    assertU128(supply, "supply");
    return this.executor.execute("uniques.mint", caller, (scope) => {
      if (supply === 0n) scope.reject("NoSupply");

      const assetId = this.allocator.next() ?? scope.reject("TypeOverflow");
      this.assets.insert(assetId, { creator: caller, metadata, supply });
      this.balances.set(assetId, caller, supply);

      scope.emit({ registry: "uniques", type: "Created", assetId, creator: caller });
      return { assetId, supply };
    });
  }

  burn(
    caller: AccountId,
    assetId: AssetId,
    amount: bigint,
  ): CommandResult<UniqueBurnOutcome, "Unknown" | "NotOwned"> {
    assertU128(assetId, "assetId");
    assertU128(amount, "amount");
    return this.executor.execute("uniques.burn", caller, (scope) => {
      const details = this.assets.get(assetId) ?? scope.reject("Unknown");
      const owned = this.balances.balanceOf(assetId, caller);
      if (owned === 0n) scope.reject("NotOwned");

      const burned = minU128(amount, owned);
      this.balances.debit(assetId, caller, burned);
      const totalSupply = saturatingSub(details.supply, burned);
      this.assets.insert(assetId, { ...details, supply: totalSupply });

      scope.emit({ registry: "uniques", type: "Burned", assetId, owner: caller, totalSupply });
      return { assetId, totalSupply, burned };
    });
  }

  transfer(
    caller: AccountId,
    assetId: AssetId,
    amount: bigint,
    to: AccountId,
  ): CommandResult<UniqueTransferOutcome, "Unknown" | "NotOwned"> {
    assertU128(assetId, "assetId");
    assertU128(amount, "amount");
    return this.executor.execute("uniques.transfer", caller, (scope) => {
      if (!this.assets.contains(assetId)) scope.reject("Unknown");
      const owned = this.balances.balanceOf(assetId, caller);
      if (owned === 0n) scope.reject("NotOwned");

      const transferred = minU128(amount, owned);
      this.balances.debit(assetId, caller, transferred);
      this.balances.credit(assetId, to, transferred);

      scope.emit({
        registry: "uniques",
        type: "Transferred",
        assetId,
        from: caller,
        to,
        amount: transferred,
      });
      return { assetId, transferred };
    });
  }

  asset(assetId: AssetId): UniqueAssetDetails | undefined {
    return this.assets.get(assetId);
  }

  balanceOf(assetId: AssetId, account: AccountId): bigint {
    return this.balances.balanceOf(assetId, account);
  }

  holders(assetId: AssetId): Holding[] {
    return this.balances.holders(assetId);
  }

  nonce(): AssetId {
    return this.allocator.peek();
  }

  audit(assetId: AssetId): SupplyAudit | undefined {
    const details = this.assets.get(assetId);
    if (!details) return undefined;
    const holdings = this.balances.total(assetId);
    return { assetId, supply: details.supply, holdings, consistent: holdings === details.supply };
  }

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
