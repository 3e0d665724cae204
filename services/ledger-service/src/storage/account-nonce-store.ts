import {
  accountKey,
  StorageMap,
  u128Value,
  type AccountId,
  type KeyValueBackend,
} from "@tokenledger/ledger-core";

const NONCE_NAMESPACE = "auth/nonce";

/** Last accepted signed-request nonce per account, kept in the ledger backend. */
export class AccountNonceStore {
  private readonly nonces: StorageMap<AccountId, bigint>;

  constructor(private readonly backend: KeyValueBackend) {
    this.nonces = new StorageMap(backend, NONCE_NAMESPACE, accountKey, u128Value);
  }

  /** Records `nonce` and returns true only when it is above the last one accepted. */
  accept(account: AccountId, nonce: bigint): boolean {
    return this.backend.transaction(() => {
      const last = this.nonces.get(account);
      if (last !== undefined && nonce <= last) return false;
      this.nonces.insert(account, nonce);
      return true;
    });
  }
}
