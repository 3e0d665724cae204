import { canonicalize } from "json-canonicalize";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Canonicalize before hashing/signing for stable outputs.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function sha256Hex(input: string): string {
  return bytesToHex(sha256(utf8ToBytes(input)));
}

export interface RequestParts {
  method: string;
  url: string;
  body?: unknown;
}

export interface SignedRequestParts extends RequestParts {
  /** Decimal counter; each account's nonces must strictly increase. */
  nonce: string;
}

/** Digest an account signs to authenticate one HTTP request. */
export function requestDigest(parts: SignedRequestParts): string {
  return sha256Hex(
    canonicalJson({
      method: parts.method.toUpperCase(),
      url: parts.url,
      body: parts.body ?? null,
      nonce: parts.nonce,
    }),
  );
}
