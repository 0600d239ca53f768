/**
 * bolt11 decoding for pay callback validation
 */

import * as bolt11 from 'bolt11';
import { LNURLDecodeError, errorMessage, type Invoice } from '@lnurl-wallet/core';

export type InvoiceDecoder = (pr: string) => Invoice;

function tagValue(decoded: ReturnType<typeof bolt11.decode>, name: string): string | undefined {
  const tag = decoded.tags.find((t) => t.tagName === name);
  return typeof tag?.data === 'string' ? tag.data : undefined;
}

export const decodeInvoice: InvoiceDecoder = (pr) => {
  let decoded: ReturnType<typeof bolt11.decode>;
  try {
    decoded = bolt11.decode(pr.trim());
  } catch (error) {
    throw new LNURLDecodeError(`invalid bolt11 invoice: ${errorMessage(error)}`);
  }

  const paymentHash = tagValue(decoded, 'payment_hash');
  if (!paymentHash) {
    throw new LNURLDecodeError('invalid bolt11 invoice: missing payment hash');
  }

  return {
    bolt11: pr.trim(),
    msatoshi: decoded.millisatoshis ? Number(decoded.millisatoshis) : 0,
    descriptionHash: tagValue(decoded, 'purpose_commit_hash'),
    paymentHash,
  };
};
