/**
 * LUD-09 / LUD-10 success actions
 */

import { createDecipheriv } from 'crypto';
import { DecipherError, errorMessage, type SuccessAction } from '@lnurl-wallet/core';
import { isJsonObject } from '../lib/http';

/**
 * Parse a success action from a pay callback body.
 * Returns null when absent; unknown tags or bad shapes also yield null
 * (the payment itself is still valid).
 */
export function parseSuccessAction(raw: unknown): SuccessAction | null {
  if (!isJsonObject(raw) || typeof raw.tag !== 'string') {
    return null;
  }

  const description = typeof raw.description === 'string' ? raw.description : '';

  switch (raw.tag) {
    case 'message':
      return typeof raw.message === 'string' ? { tag: 'message', message: raw.message } : null;
    case 'url':
      return typeof raw.url === 'string' ? { tag: 'url', description, url: raw.url } : null;
    case 'aes':
      if (typeof raw.ciphertext !== 'string' || typeof raw.iv !== 'string') return null;
      return { tag: 'aes', description, ciphertext: raw.ciphertext, iv: raw.iv };
    default:
      return null;
  }
}

/**
 * AES-256-CBC decrypt with the 32-byte payment preimage as key.
 */
export function decipherAes(action: { ciphertext: string; iv: string }, preimage: Buffer): string {
  if (preimage.length !== 32) {
    throw new DecipherError(`preimage must be 32 bytes, got ${preimage.length}`);
  }

  const iv = Buffer.from(action.iv, 'base64');
  if (iv.length !== 16) {
    throw new DecipherError(`iv must be 16 bytes, got ${iv.length}`);
  }

  try {
    const decipher = createDecipheriv('aes-256-cbc', preimage, iv);
    const plain = Buffer.concat([decipher.update(Buffer.from(action.ciphertext, 'base64')), decipher.final()]);
    return plain.toString('utf8');
  } catch (error) {
    throw new DecipherError(`failed to decrypt: ${errorMessage(error)}`);
  }
}

export interface ResolvedSuccessAction {
  text: string;
  url?: string;
  decipherError?: string;
}

/**
 * Text to show once the payment completed. A decrypt failure is reported
 * in `decipherError` instead of being thrown.
 */
export function resolveSuccessAction(action: SuccessAction, preimage: Buffer): ResolvedSuccessAction {
  switch (action.tag) {
    case 'message':
      return { text: action.message };
    case 'url':
      return { text: action.description, url: action.url };
    case 'aes':
      try {
        return { text: decipherAes(action, preimage) };
      } catch (error) {
        return { text: action.description, decipherError: errorMessage(error) };
      }
  }
}
