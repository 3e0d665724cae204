import { requestDigest, type RequestParts, type SignedRequestParts } from "../crypto/digest.js";
import { publicKeyFromPrivateKeyHex, signHex, verifyHex } from "../crypto/ed25519.js";

export const ACCOUNT_ID_HEADER = "x-account-id";
export const ACCOUNT_SIGNATURE_HEADER = "x-account-signature";
export const ACCOUNT_NONCE_HEADER = "x-account-nonce";

export type AccountAuthMode = "header" | "signature";

export interface SignedAccount {
  account: string;
  nonce: string;
}

function firstHeaderValue(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? firstHeaderValue(first) : null;
  }
  return null;
}

export function parseAccountHeader(value: unknown): string | null {
  return firstHeaderValue(value);
}

export function parseAccountAuthMode(raw: string | undefined): AccountAuthMode {
  const normalized = (raw || "").trim().toLowerCase();
  if (!normalized || normalized === "header") return "header";
  if (normalized === "signature") return "signature";
  throw new Error(`Unsupported AUTH_MODE '${raw}' (expected 'header' or 'signature')`);
}

/**
 * Headers for a request signed with an Ed25519 key. The account id is the
 * hex public key; the nonce travels in its own header and is part of the
 * signed digest.
 */
export async function buildSignedAccountHeaders(
  privateKeyHex: string,
  request: SignedRequestParts,
): Promise<Record<string, string>> {
  const account = await publicKeyFromPrivateKeyHex(privateKeyHex);
  const signature = await signHex(requestDigest(request), privateKeyHex);
  return {
    [ACCOUNT_ID_HEADER]: account,
    [ACCOUNT_SIGNATURE_HEADER]: signature,
    [ACCOUNT_NONCE_HEADER]: request.nonce,
  };
}

/**
 * Resolves the signing account and its nonce, or null when the signature does
 * not match. Whether the nonce is fresh is for the caller to decide.
 */
export async function verifySignedAccount(
  headers: Record<string, unknown>,
  request: RequestParts,
): Promise<SignedAccount | null> {
  const account = parseAccountHeader(headers[ACCOUNT_ID_HEADER]);
  const signature = parseAccountHeader(headers[ACCOUNT_SIGNATURE_HEADER]);
  const nonce = parseAccountHeader(headers[ACCOUNT_NONCE_HEADER]);
  if (!account || !signature || !nonce) return null;
  if (!/^[0-9a-fA-F]{64}$/.test(account)) return null;
  if (!/^\d{1,39}$/.test(nonce)) return null;

  const valid = await verifyHex(requestDigest({ ...request, nonce }), signature, account);
  return valid ? { account: account.toLowerCase(), nonce } : null;
}
