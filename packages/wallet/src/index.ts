/**
 * LNURL Wallet
 * Flows, broker, ledger checks and HTTP hooks
 */

export * from './wallet-core';
export * from './app';

export * from './flows/context';
export * from './flows/handler';
export * from './flows/auth';
export * from './flows/withdraw';
export * from './flows/pay';

export * from './lnurl/codec';
export * from './lnurl/invoice';
export * from './lnurl/metadata';
export * from './lnurl/params';
export * from './lnurl/success-action';
export * from './lnurl/auth-key';

export * from './services/payment-broker';
export * from './services/ledger';
export * from './services/dollar-rate';

export * from './lib/config';
export * from './lib/db-client';
export * from './lib/redis-client';
export * from './lib/http';
export * from './lib/tasks';

export * from './routes/health';
export * from './routes/payments';
export * from './middleware/hook-auth';
