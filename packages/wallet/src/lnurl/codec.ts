/**
 * LNURL text codec
 * bech32 (LUD-01), scheme URLs (LUD-17) and lightning addresses (LUD-16)
 */

import { createHash } from 'crypto';
import { bech32 } from 'bech32';
import { LNURLDecodeError, errorMessage } from '@lnurl-wallet/core';

// bech32's default 90-char limit is far too small for URLs
const BECH32_LIMIT = 2000;

const BECH32_LNURL = /^lnurl1[02-9ac-hj-np-z]+$/i;
const SCHEME_LNURL = /^(lnurlp|lnurlw|lnurlc|keyauth):\/\//i;
const LIGHTNING_ADDRESS = /^([a-z0-9._+-]+)@([a-z0-9.-]+\.[a-z0-9]{2,}(?::\d+)?)$/i;

function stripPrefix(text: string): string {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();
  if (lower.startsWith('lightning:')) return trimmed.slice('lightning:'.length);
  if (lower.startsWith('lnurl:')) return trimmed.slice('lnurl:'.length);
  return trimmed;
}

function isOnion(host: string): boolean {
  return host.split(':')[0].toLowerCase().endsWith('.onion');
}

export function isLightningAddress(text: string): boolean {
  return LIGHTNING_ADDRESS.test(text.trim());
}

/**
 * LUD-16: user@domain -> https://domain/.well-known/lnurlp/user
 */
export function lightningAddressToURL(address: string): string {
  const match = LIGHTNING_ADDRESS.exec(address.trim());
  if (!match) {
    throw new LNURLDecodeError(`invalid lightning address: ${address}`);
  }
  const [, user, domain] = match;
  const scheme = isOnion(domain) ? 'http' : 'https';
  return `${scheme}://${domain.toLowerCase()}/.well-known/lnurlp/${user.toLowerCase()}`;
}

/**
 * Resolve LNURL text to the URL string it denotes, byte-for-byte.
 */
export function decodeLNURLString(text: string): string {
  const value = stripPrefix(text);

  if (BECH32_LNURL.test(value)) {
    try {
      const decoded = bech32.decode(value.toLowerCase(), BECH32_LIMIT);
      if (decoded.prefix !== 'lnurl') {
        throw new Error(`unexpected prefix ${decoded.prefix}`);
      }
      const url = Buffer.from(bech32.fromWords(decoded.words)).toString('utf8');
      return checkURL(url);
    } catch (error) {
      if (error instanceof LNURLDecodeError) throw error;
      throw new LNURLDecodeError(`invalid bech32 lnurl: ${errorMessage(error)}`);
    }
  }

  if (SCHEME_LNURL.test(value)) {
    const rest = value.replace(SCHEME_LNURL, '');
    const host = rest.split(/[/?#]/)[0];
    return checkURL(`${isOnion(host) ? 'http' : 'https'}://${rest}`);
  }

  if (isLightningAddress(value)) {
    return lightningAddressToURL(value);
  }

  return checkURL(value);
}

function checkURL(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new LNURLDecodeError(`not a valid lnurl: ${raw}`);
  }

  if (url.protocol === 'https:') return raw;
  if (url.protocol === 'http:' && isOnion(url.host)) return raw;
  throw new LNURLDecodeError(`lnurl must use https (got ${url.protocol}//${url.host})`);
}

export function decodeLNURL(text: string): URL {
  return new URL(decodeLNURLString(text));
}

/**
 * Canonical upper-case bech32 form. Idempotent on bech32 input.
 */
export function encodeLNURL(text: string): string {
  const url = decodeLNURLString(text);
  const words = bech32.toWords(Buffer.from(url, 'utf8'));
  return bech32.encode('lnurl', words, BECH32_LIMIT).toUpperCase();
}

/**
 * First bech32 or scheme LNURL found in free text.
 */
export function findLNURLInText(text: string): string | null {
  const bech = /(?:lightning:)?(lnurl1[02-9ac-hj-np-z]+)/i.exec(text);
  if (bech) return bech[1];

  const scheme = /(?:lnurlp|lnurlw|lnurlc|keyauth):\/\/[^\s"'<>]+/i.exec(text);
  if (scheme) return scheme[0];

  return null;
}

/**
 * First bolt11 invoice found in free text, lower-cased.
 */
export function findBolt11InText(text: string): string | null {
  const match = /(lnbcrt|lntbs|lntb|lnbc)[0-9]+[a-z0-9]+/.exec(text.toLowerCase());
  return match ? match[0] : null;
}

/**
 * Lowercase hex SHA-256 of the UTF-8 bytes of `data`.
 */
export function calculateHash(data: string): string {
  return createHash('sha256').update(data, 'utf8').digest('hex');
}

/**
 * Payment hash for a hex preimage: SHA-256 of the raw bytes, lowercase hex.
 */
export function calculatePreimageHash(preimageHex: string): string {
  return createHash('sha256').update(Buffer.from(preimageHex, 'hex')).digest('hex');
}
