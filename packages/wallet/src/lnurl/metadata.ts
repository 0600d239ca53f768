/**
 * LUD-06 pay metadata
 * An ordered JSON array of [type, value] pairs, hashed verbatim
 */

import { LNURLDecodeError, type MetadataEntry, type PayMetadata } from '@lnurl-wallet/core';

export function parseMetadata(encoded: string): PayMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(encoded);
  } catch {
    throw new LNURLDecodeError('pay metadata is not valid JSON');
  }

  if (!Array.isArray(raw)) {
    throw new LNURLDecodeError('pay metadata must be an array');
  }

  const entries: MetadataEntry[] = [];
  for (const item of raw) {
    // unknown entry shapes are skipped, the string is still hashed as-is
    if (Array.isArray(item) && typeof item[0] === 'string' && typeof item[1] === 'string') {
      entries.push([item[0], item[1]]);
    }
  }

  return { encoded, entries };
}

function entry(metadata: PayMetadata, type: string): string | undefined {
  return metadata.entries.find(([t]) => t === type)?.[1];
}

export function metadataDescription(metadata: PayMetadata): string {
  return entry(metadata, 'text/plain') ?? '';
}

export function metadataLongDescription(metadata: PayMetadata): string | undefined {
  return entry(metadata, 'text/long-desc');
}

/** LUD-16 identifier, if the service declared one */
export function metadataIdentifier(metadata: PayMetadata): string | undefined {
  return entry(metadata, 'text/identifier') ?? entry(metadata, 'text/email');
}

export interface MetadataImage {
  bytes: Buffer;
  extension: 'png' | 'jpeg';
  mimeType: string;
}

export function metadataImage(metadata: PayMetadata): MetadataImage | undefined {
  for (const [type, value] of metadata.entries) {
    const extension = type === 'image/png;base64' ? 'png' : type === 'image/jpeg;base64' ? 'jpeg' : undefined;
    if (!extension) continue;

    const bytes = Buffer.from(value, 'base64');
    if (bytes.length === 0) continue;
    return { bytes, extension, mimeType: `image/${extension}` };
  }
  return undefined;
}
