import type { StorageValue } from "./storage/maps.js";
import { checkedAdd, MAX_U128, saturatingAdd } from "./u128.js";
import type { AssetId } from "./types.js";

abstract class NonceAllocator {
  constructor(
    protected readonly nonce: StorageValue<bigint>,
    readonly max: bigint = MAX_U128,
  ) {}

  /** Id the next allocation would return. */
  peek(): AssetId {
    return this.nonce.get();
  }
}

/**
 * Never fails. Once the nonce reaches `max` every call returns `max` again,
 * so allocation silently stops producing fresh ids.
 */
export class SaturatingIdAllocator extends NonceAllocator {
  next(): AssetId {
    const id = this.nonce.get();
    this.nonce.set(saturatingAdd(id, 1n, this.max));
    return id;
  }
}

/** Returns null, writing nothing, when the nonce is already at `max`. */
export class CheckedIdAllocator extends NonceAllocator {
  next(): AssetId | null {
    const id = this.nonce.get();
    const advanced = checkedAdd(id, 1n, this.max);
    if (advanced === null) return null;
    this.nonce.set(advanced);
    return id;
  }
}
