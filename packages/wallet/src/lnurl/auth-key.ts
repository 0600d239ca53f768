/**
 * lnurl-auth linking keys
 *
 * The key is re-derivable from (userId, secret) alone, so nothing
 * auth-specific is ever stored.
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import { LNURLDecodeError } from '@lnurl-wallet/core';

export interface LinkingKey {
  privateKey: Uint8Array;
  /** Compressed secp256k1 public key, hex */
  publicKey: string;
}

export function deriveLinkingKey(userId: number, secret: string): LinkingKey {
  const privateKey = sha256(utf8ToBytes(`lnurlkeyseed:${userId}:${secret}`));
  return {
    privateKey,
    publicKey: bytesToHex(secp256k1.getPublicKey(privateKey, true)),
  };
}

/**
 * Sign a 32-byte hex challenge. RFC 6979 nonces make the signature
 * deterministic; the result is DER-encoded hex as LUD-04 requires.
 */
export function signChallenge(k1: string, key: LinkingKey): string {
  if (!/^[0-9a-f]{64}$/i.test(k1)) {
    throw new LNURLDecodeError('k1 must be 32 bytes of hex');
  }
  return secp256k1.sign(hexToBytes(k1.toLowerCase()), key.privateKey).toDERHex();
}

export function verifyChallenge(k1: string, signature: string, publicKey: string): boolean {
  try {
    return secp256k1.verify(signature, hexToBytes(k1.toLowerCase()), publicKey);
  } catch {
    return false;
  }
}
