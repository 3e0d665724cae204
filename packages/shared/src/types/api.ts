import type { AssetView, HoldingView, SupplyAuditView, UniqueAssetView } from "./assets.js";
import type { LedgerEvent, LedgerEventRecord, RegistryName } from "./events.js";

export type LedgerErrorCode =
  | "Unknown"
  | "NoPermission"
  | "NotOwned"
  | "NoSupply"
  | "TypeOverflow";

export interface ApiErrorResponse {
  error: string;
  code?: LedgerErrorCode;
  message?: string;
}

export interface CreateAssetResponse {
  assetId: string;
  events: LedgerEvent[];
}

export interface SetMetadataRequest {
  name: string;
  symbol: string;
}

export interface SetMetadataResponse {
  assetId: string;
  events: LedgerEvent[];
}

export interface MintAssetRequest {
  amount: string;
  to: string;
}

export interface MintAssetResponse {
  assetId: string;
  totalSupply: string;
  minted: string;
  events: LedgerEvent[];
}

export interface BurnRequest {
  amount: string;
}

export interface BurnResponse {
  assetId: string;
  totalSupply: string;
  burned: string;
  events: LedgerEvent[];
}

export interface TransferRequest {
  amount: string;
  to: string;
}

export interface TransferResponse {
  assetId: string;
  transferred: string;
  events: LedgerEvent[];
}

export interface MintUniqueRequest {
  metadata: string;
  supply: string;
}

export interface MintUniqueResponse {
  assetId: string;
  supply: string;
  events: LedgerEvent[];
}

export interface GetAssetResponse {
  asset: AssetView;
}

export interface GetUniqueAssetResponse {
  asset: UniqueAssetView;
}

export interface GetBalanceResponse {
  assetId: string;
  account: string;
  balance: string;
}

export interface ListHoldersResponse {
  assetId: string;
  holders: HoldingView[];
}

export interface GetAuditResponse {
  audit: SupplyAuditView;
}

export interface ListEventsQuery {
  registry?: RegistryName;
  assetId?: string;
  after?: number;
  limit?: number;
}

export interface ListEventsResponse {
  events: LedgerEventRecord[];
  nextCursor?: number;
}
