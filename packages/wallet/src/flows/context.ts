/**
 * Shared dependencies for the LNURL flows
 */

import {
  Logger,
  errorMeta,
  type ChatTransport,
  type Notification,
  type ReplyStore,
  type SendOptions,
  type SentMessage,
  type Tracker,
  type WalletBackend,
  type WalletUser,
} from '@lnurl-wallet/core';
import type { TaskGroup } from '../lib/tasks';
import type { InvoiceDecoder } from '../lnurl/invoice';
import type { PaymentBroker } from '../services/payment-broker';

export interface DollarPricer {
  formatDollarPrice(msats: number): Promise<string>;
}

export interface FlowContext {
  transport: ChatTransport;
  wallet: WalletBackend;
  tracker: Tracker;
  replies: ReplyStore;
  broker: PaymentBroker;
  rates: DollarPricer;
  tasks: TaskGroup;
  logger: Logger;
  decodeInvoice: InvoiceDecoder;
  authSecret: string;
  httpTimeoutMs: number;
  confirmationTimeoutMs: number;
  successActionDelayMs: number;
}

/** Options shared by every flow the dispatcher starts */
export interface HandleOptions {
  /** Message that triggered the flow; replies thread under it */
  promptMessageId?: number;
  loginSilently?: boolean;
  /** Millisatoshi threshold under which fixed-amount offers pay without asking */
  payWithoutPromptIf?: number;
}

/**
 * Deliver a notification. Transport failures are logged and reported as
 * undefined; a flow never fails because a chat message could not be sent.
 */
export async function notify(
  ctx: Pick<FlowContext, 'transport' | 'logger'>,
  user: WalletUser,
  notification: Notification,
  options?: SendOptions
): Promise<SentMessage | undefined> {
  try {
    return await ctx.transport.send(user, notification, options);
  } catch (error) {
    ctx.logger.warn('Failed to deliver notification', {
      userId: user.id,
      kind: notification.kind,
      ...errorMeta(error),
    });
    return undefined;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
