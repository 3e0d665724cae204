import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import {
  isU128,
  type AssetDetails,
  type AssetId,
  type AssetMetadata,
  type Holding,
  type LedgerEvent as CoreLedgerEvent,
  type SupplyAudit,
  type UniqueAssetDetails,
} from "@tokenledger/ledger-core";
import type {
  AssetView,
  HoldingView,
  LedgerEvent,
  SupplyAuditView,
  UniqueAssetView,
} from "@tokenledger/shared";

const U128_DIGITS = /^\d{1,39}$/;
const HEX_BYTES = /^(?:[0-9a-fA-F]{2})*$/;

/** Decimal string to u128, or null when it is not one. */
export function parseU128(value: unknown): bigint | null {
  if (typeof value !== "string" || !U128_DIGITS.test(value)) return null;
  const parsed = BigInt(value);
  return isU128(parsed) ? parsed : null;
}

export function parseHexBytes(value: unknown): Uint8Array | null {
  if (typeof value !== "string" || !HEX_BYTES.test(value)) return null;
  return hexToBytes(value);
}

export function toWireEvent(event: CoreLedgerEvent): LedgerEvent {
  const assetId = event.assetId.toString();
  switch (event.type) {
    case "Created":
      return event.registry === "assets"
        ? { registry: "assets", type: "Created", assetId, owner: event.owner }
        : { registry: "uniques", type: "Created", assetId, creator: event.creator };
    case "MetadataSet":
      return {
        registry: "assets",
        type: "MetadataSet",
        assetId,
        name: bytesToHex(event.name),
        symbol: bytesToHex(event.symbol),
      };
    case "Minted":
      return {
        registry: "assets",
        type: "Minted",
        assetId,
        owner: event.owner,
        totalSupply: event.totalSupply.toString(),
      };
    case "Burned":
      return {
        registry: event.registry,
        type: "Burned",
        assetId,
        owner: event.owner,
        totalSupply: event.totalSupply.toString(),
      };
    case "Transferred":
      return {
        registry: event.registry,
        type: "Transferred",
        assetId,
        from: event.from,
        to: event.to,
        amount: event.amount.toString(),
        ...(event.registry === "assets" ? { requested: event.requested.toString() } : {}),
      };
  }
}

export function toAssetView(
  assetId: AssetId,
  details: AssetDetails,
  metadata: AssetMetadata | undefined,
): AssetView {
  return {
    assetId: assetId.toString(),
    owner: details.owner,
    supply: details.supply.toString(),
    ...(metadata
      ? { metadata: { name: bytesToHex(metadata.name), symbol: bytesToHex(metadata.symbol) } }
      : {}),
  };
}

export function toUniqueAssetView(assetId: AssetId, details: UniqueAssetDetails): UniqueAssetView {
  return {
    assetId: assetId.toString(),
    creator: details.creator,
    metadata: bytesToHex(details.metadata),
    supply: details.supply.toString(),
  };
}

export function toHoldingView(holding: Holding): HoldingView {
  return { account: holding.account, balance: holding.balance.toString() };
}

export function toAuditView(audit: SupplyAudit): SupplyAuditView {
  return {
    assetId: audit.assetId.toString(),
    supply: audit.supply.toString(),
    holdings: audit.holdings.toString(),
    consistent: audit.consistent,
  };
}
