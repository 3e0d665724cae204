import type { StorageDoubleMap } from "./storage/maps.js";
import { saturatingAdd, saturatingSub } from "./u128.js";
import type { AccountId, AssetId, Holding } from "./types.js";

export class BalanceLedger {
  constructor(private readonly accounts: StorageDoubleMap<AssetId, AccountId, bigint>) {}

  balanceOf(assetId: AssetId, account: AccountId): bigint {
    return this.accounts.get(assetId, account);
  }

  set(assetId: AssetId, account: AccountId, amount: bigint): void {
    this.accounts.insert(assetId, account, amount);
  }

  /** Saturating add; returns the amount actually credited. */
  credit(assetId: AssetId, account: AccountId, amount: bigint): bigint {
    const before = this.accounts.get(assetId, account);
    const after = this.accounts.mutate(assetId, account, (balance) => saturatingAdd(balance, amount));
    return after - before;
  }

  /** Saturating sub; returns the amount actually debited. */
  debit(assetId: AssetId, account: AccountId, amount: bigint): bigint {
    const before = this.accounts.get(assetId, account);
    const after = this.accounts.mutate(assetId, account, (balance) => saturatingSub(balance, amount));
    return before - after;
  }

  holders(assetId: AssetId): Holding[] {
    return this.accounts.entries(assetId).map(([account, balance]) => ({ account, balance }));
  }

  total(assetId: AssetId): bigint {
    return this.holders(assetId).reduce((sum, holding) => sum + holding.balance, 0n);
  }
}
