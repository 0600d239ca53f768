/**
 * Redis Client
 * Pending-reply cache used to resume a flow when the user answers a prompt
 */

import { createClient } from 'redis';
import { Logger, errorMeta, type ReplyStore } from '@lnurl-wallet/core';

export interface RedisConfig {
  url: string;
}

export class RedisReplyStore implements ReplyStore {
  private client: ReturnType<typeof createClient>;
  private connected: boolean = false;

  constructor(
    config: RedisConfig,
    private logger: Logger = new Logger({ serviceName: 'lnurl-wallet:redis' })
  ) {
    this.client = createClient({
      url: config.url,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            this.logger.error('Redis reconnect attempts exceeded');
            this.connected = false;
            return new Error('Redis connection failed');
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    this.client.on('error', (err: unknown) => {
      this.logger.error('Redis client error', errorMeta(err));
    });
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    await this.client.connect();
    this.connected = true;
    this.logger.info('Redis connected');
  }

  async isConnected(): Promise<boolean> {
    if (!this.connected) return false;
    try {
      await this.client.ping();
      return true;
    } catch {
      return false;
    }
  }

  async put(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.setEx(key, ttlSeconds, value);
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async close(): Promise<void> {
    if (this.connected) {
      await this.client.quit();
      this.connected = false;
    }
  }
}

export function replyKey(userId: number, messageId: number): string {
  return `reply:${userId}:${messageId}`;
}
