import * as ed from "@noble/ed25519";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

export async function publicKeyFromPrivateKeyHex(privateKeyHex: string): Promise<string> {
  return bytesToHex(await ed.getPublicKeyAsync(hexToBytes(privateKeyHex)));
}

export async function signHex(hashHex: string, privateKeyHex: string): Promise<string> {
  const sig = await ed.signAsync(hexToBytes(hashHex), hexToBytes(privateKeyHex));
  return bytesToHex(sig);
}

/** False for malformed hex as well as for a signature that does not verify. */
export async function verifyHex(
  hashHex: string,
  signatureHex: string,
  publicKeyHex: string,
): Promise<boolean> {
  try {
    return await ed.verifyAsync(hexToBytes(signatureHex), hexToBytes(hashHex), hexToBytes(publicKeyHex));
  } catch {
    return false;
  }
}
