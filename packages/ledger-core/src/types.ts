export type AssetId = bigint;

/** Opaque to the core: compared for equality only. */
export type AccountId = string;

export type RegistryKind = "assets" | "uniques";

export interface AssetDetails {
  owner: AccountId;
  supply: bigint;
}

export interface AssetMetadata {
  name: Uint8Array;
  symbol: Uint8Array;
}

export interface UniqueAssetDetails {
  creator: AccountId;
  metadata: Uint8Array;
  supply: bigint;
}

export interface Holding {
  account: AccountId;
  balance: bigint;
}

export interface SupplyAudit {
  assetId: AssetId;
  supply: bigint;
  holdings: bigint;
  consistent: boolean;
}

export type LedgerErrorCode =
  | "Unknown"
  | "NoPermission"
  | "NotOwned"
  | "NoSupply"
  | "TypeOverflow";

export type AssetEventType = "Created" | "MetadataSet" | "Minted" | "Burned" | "Transferred";

interface LedgerEventBase {
  registry: RegistryKind;
  type: AssetEventType;
  assetId: AssetId;
}

export interface AssetCreatedEvent extends LedgerEventBase {
  registry: "assets";
  type: "Created";
  owner: AccountId;
}

export interface AssetMetadataSetEvent extends LedgerEventBase {
  registry: "assets";
  type: "MetadataSet";
  name: Uint8Array;
  symbol: Uint8Array;
}

export interface AssetMintedEvent extends LedgerEventBase {
  registry: "assets";
  type: "Minted";
  owner: AccountId;
  totalSupply: bigint;
}

export interface AssetBurnedEvent extends LedgerEventBase {
  registry: "assets";
  type: "Burned";
  owner: AccountId;
  totalSupply: bigint;
}

export interface AssetTransferredEvent extends LedgerEventBase {
  registry: "assets";
  type: "Transferred";
  from: AccountId;
  to: AccountId;
  /** Amount actually moved after clamping to the sender's balance. */
  amount: bigint;
  requested: bigint;
}

export type AssetEvent =
  | AssetCreatedEvent
  | AssetMetadataSetEvent
  | AssetMintedEvent
  | AssetBurnedEvent
  | AssetTransferredEvent;

export interface UniqueAssetCreatedEvent extends LedgerEventBase {
  registry: "uniques";
  type: "Created";
  creator: AccountId;
}

export interface UniqueAssetBurnedEvent extends LedgerEventBase {
  registry: "uniques";
  type: "Burned";
  owner: AccountId;
  totalSupply: bigint;
}

export interface UniqueAssetTransferredEvent extends LedgerEventBase {
  registry: "uniques";
  type: "Transferred";
  from: AccountId;
  to: AccountId;
  amount: bigint;
}

export type UniqueAssetEvent =
  | UniqueAssetCreatedEvent
  | UniqueAssetBurnedEvent
  | UniqueAssetTransferredEvent;

export type LedgerEvent = AssetEvent | UniqueAssetEvent;

export type CommandResult<T, E extends LedgerErrorCode = LedgerErrorCode> =
  | { ok: true; value: T; events: LedgerEvent[] }
  | { ok: false; error: E };
