/**
 * Lets a marketplace move holdings of a registry without going through the
 * command surface. `transfer` returns the amount actually moved, which is
 * clamped to what `from` owns and is zero when nothing could be moved.
 */
export interface Sellable<AccountIdT, ResourceIdT> {
  amountOwned(id: ResourceIdT, account: AccountIdT): bigint;
  transfer(id: ResourceIdT, from: AccountIdT, to: AccountIdT, amount: bigint): bigint;
}
