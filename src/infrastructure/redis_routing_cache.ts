import { Redis } from 'ioredis';
import { StoreConnectionMissingError } from '../domain/errors';
import { IRoutingCache, RoutingCacheSession } from '../domain/stores';

export type RedisClient = InstanceType<typeof Redis>;

export class RedisRoutingCache implements IRoutingCache {
    constructor(private readonly url: string | undefined) { }

    async connect(): Promise<RoutingCacheSession> {
        if (!this.url) {
            throw new StoreConnectionMissingError('routing-cache', 'REDIS_URL');
        }

        const client = new Redis(this.url, {
            lazyConnect: true,
            maxRetriesPerRequest: 0,
        });
        try {
            await client.connect();
        } catch (error) {
            // Stop the client's own reconnect loop before surfacing the failure.
            client.disconnect();
            throw error;
        }
        return new RedisRoutingCacheSession(client);
    }
}

export class RedisRoutingCacheSession implements RoutingCacheSession {
    constructor(private readonly client: RedisClient) { }

    async selectDatabase(index: number): Promise<void> {
        await this.client.select(index);
    }

    async batchDelete(keys: string[]): Promise<number[]> {
        const pipeline = this.client.pipeline();
        for (const key of keys) {
            pipeline.del(key);
        }

        const replies = await pipeline.exec();
        if (!replies) {
            throw new Error('Redis pipeline was discarded');
        }

        return replies.map(([error, reply], i) => {
            if (error) {
                throw error;
            }
            if (typeof reply !== 'number') {
                throw new Error(`Unexpected DEL reply for ${keys[i]}: ${String(reply)}`);
            }
            return reply;
        });
    }

    async close(): Promise<void> {
        await this.client.quit();
    }
}
