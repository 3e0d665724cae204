export interface AssetView {
  assetId: string;
  owner: string;
  supply: string;
  metadata?: {
    name: string;
    symbol: string;
  };
}

export interface UniqueAssetView {
  assetId: string;
  creator: string;
  metadata: string;
  supply: string;
}

export interface HoldingView {
  account: string;
  balance: string;
}

export interface SupplyAuditView {
  assetId: string;
  supply: string;
  holdings: string;
  consistent: boolean;
}
