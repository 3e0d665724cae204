import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import type { AssetDetails, AssetMetadata, UniqueAssetDetails } from "../types.js";

export interface Codec<T> {
  encode(value: T): string;
  decode(raw: string): T;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function parseRecord(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (!isObject(parsed)) {
    throw new Error(`Corrupt storage record: ${raw}`);
  }
  return parsed;
}

function readString(record: Record<string, unknown>, field: string): string {
  const value = record[field];
  if (typeof value !== "string") {
    throw new Error(`Corrupt storage record: '${field}' is not a string`);
  }
  return value;
}

function readU128(record: Record<string, unknown>, field: string): bigint {
  const value = readString(record, field);
  if (!/^\d+$/.test(value)) {
    throw new Error(`Corrupt storage record: '${field}' is not an unsigned integer`);
  }
  return BigInt(value);
}

function readBytes(record: Record<string, unknown>, field: string): Uint8Array {
  return hexToBytes(readString(record, field));
}

export const assetIdKey: Codec<bigint> = {
  encode: (id) => id.toString(),
  decode: (raw) => BigInt(raw),
};

export const accountKey: Codec<string> = {
  encode: (account) => encodeURIComponent(account),
  decode: (raw) => decodeURIComponent(raw),
};

export const u128Value: Codec<bigint> = {
  encode: (value) => value.toString(),
  decode: (raw) => {
    if (!/^\d+$/.test(raw)) {
      throw new Error(`Corrupt storage value: ${raw}`);
    }
    return BigInt(raw);
  },
};

export const assetDetailsValue: Codec<AssetDetails> = {
  encode: (details) => JSON.stringify({ owner: details.owner, supply: details.supply.toString() }),
  decode: (raw) => {
    const record = parseRecord(raw);
    return { owner: readString(record, "owner"), supply: readU128(record, "supply") };
  },
};

export const assetMetadataValue: Codec<AssetMetadata> = {
  encode: (metadata) =>
    JSON.stringify({ name: bytesToHex(metadata.name), symbol: bytesToHex(metadata.symbol) }),
  decode: (raw) => {
    const record = parseRecord(raw);
    return { name: readBytes(record, "name"), symbol: readBytes(record, "symbol") };
  },
};

export const uniqueAssetDetailsValue: Codec<UniqueAssetDetails> = {
  encode: (details) =>
    JSON.stringify({
      creator: details.creator,
      metadata: bytesToHex(details.metadata),
      supply: details.supply.toString(),
    }),
  decode: (raw) => {
    const record = parseRecord(raw);
    return {
      creator: readString(record, "creator"),
      metadata: readBytes(record, "metadata"),
      supply: readU128(record, "supply"),
    };
  },
};
