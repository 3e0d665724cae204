export type RegistryName = "assets" | "uniques";

export type LedgerEventType =
  | "Created"
  | "MetadataSet"
  | "Minted"
  | "Burned"
  | "Transferred";

// Amounts and ids are decimal strings, byte fields lowercase hex.
export interface LedgerEventBase {
  registry: RegistryName;
  type: LedgerEventType;
  assetId: string;
}

export interface AssetCreatedEvent extends LedgerEventBase {
  registry: "assets";
  type: "Created";
  owner: string;
}

export interface MetadataSetEvent extends LedgerEventBase {
  registry: "assets";
  type: "MetadataSet";
  name: string;
  symbol: string;
}

export interface MintedEvent extends LedgerEventBase {
  registry: "assets";
  type: "Minted";
  owner: string;
  totalSupply: string;
}

export interface BurnedEvent extends LedgerEventBase {
  type: "Burned";
  owner: string;
  totalSupply: string;
}

export interface TransferredEvent extends LedgerEventBase {
  type: "Transferred";
  from: string;
  to: string;
  amount: string;
  requested?: string;
}

export interface UniqueCreatedEvent extends LedgerEventBase {
  registry: "uniques";
  type: "Created";
  creator: string;
}

export type LedgerEvent =
  | AssetCreatedEvent
  | MetadataSetEvent
  | MintedEvent
  | BurnedEvent
  | TransferredEvent
  | UniqueCreatedEvent;

export interface LedgerEventRecord {
  seq: number;
  eventHash: string;
  recordedAt: string;
  event: LedgerEvent;
}
