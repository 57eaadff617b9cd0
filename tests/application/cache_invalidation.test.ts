import { CacheInvalidation } from '../../src/application/cache_invalidation';
import { InMemoryRoutingCache } from '../../src/infrastructure/in_memory_stores';
import { RedisRoutingCache } from '../../src/infrastructure/redis_routing_cache';
import { EnpTarget } from '../../src/domain/enp_profile';
import {
    StoreConnectionMissingError,
    StoreOperationFailedError,
    UnsupportedNumberFormatError,
} from '../../src/domain/errors';

describe('CacheInvalidation', () => {
    let cache: InMemoryRoutingCache;
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
        cache = new InMemoryRoutingCache();
        logSpy = jest.spyOn(console, 'log').mockImplementation();
    });

    afterEach(() => {
        logSpy.mockRestore();
    });

    test('dry run reports the target database without touching the cache', async () => {
        const operation = new CacheInvalidation(cache);

        const result = await operation.execute({ input: '0412345678', dryRun: true, enpTarget: EnpTarget.NXP1 });

        expect(result).toEqual({
            dry_run: true,
            count: 1,
            expanded_targets: ['0412345678'],
            expanded_dns: ['41412345678'],
            expanded_redis_keys: ['nprn:routing:41412345678'],
            redis_db: 9,
        });
        expect(cache.calls).toEqual([]);
    });

    test('live run deletes in the selected database and reports per-key counts', async () => {
        cache.set(9, 'nprn:routing:41412345678', 'route-a');
        cache.set(0, 'nprn:routing:41412345679', 'route-b');
        const operation = new CacheInvalidation(cache);

        const result = await operation.execute({ input: '0412345678-679', dryRun: false, enpTarget: EnpTarget.NXP1 });

        expect(result.deleted_counts).toEqual([1, 0]);
        expect(result.redis_db).toBe(9);
        expect(cache.has(9, 'nprn:routing:41412345678')).toBe(false);
        expect(cache.has(0, 'nprn:routing:41412345679')).toBe(true);
        expect(cache.calls).toEqual(['connect', 'selectDatabase', 'batchDelete', 'close']);
    });

    test('missing key counts 0, not an error', async () => {
        const operation = new CacheInvalidation(cache, 3);

        const result = await operation.execute({ input: '0412345678', dryRun: false, enpTarget: EnpTarget.NXP1 });

        expect(result.deleted_counts).toEqual([0]);
        expect(result.redis_db).toBe(3);
    });

    test('invalid input never reaches the cache', async () => {
        const operation = new CacheInvalidation(cache);

        await expect(operation.execute({ input: '98765432', dryRun: false, enpTarget: EnpTarget.NXP1 }))
            .rejects.toThrow(UnsupportedNumberFormatError);
        expect(cache.calls).toEqual([]);
    });

    test('pipeline failure surfaces as StoreOperationFailedError', async () => {
        cache.failures.batchDelete = new Error('READONLY replica');
        const operation = new CacheInvalidation(cache);

        await expect(operation.execute({ input: '0412345678', dryRun: false, enpTarget: EnpTarget.NXP1 }))
            .rejects.toThrow(StoreOperationFailedError);
        expect(cache.calls).toEqual(['connect', 'selectDatabase', 'batchDelete', 'close']);
    });

    test('missing REDIS_URL is reported on a live run', async () => {
        const operation = new CacheInvalidation(new RedisRoutingCache(undefined));

        await expect(operation.execute({ input: '0412345678', dryRun: false, enpTarget: EnpTarget.NXP1 }))
            .rejects.toThrow('REDIS_URL missing');
        await expect(operation.execute({ input: '0412345678', dryRun: false, enpTarget: EnpTarget.NXP1 }))
            .rejects.toThrow(StoreConnectionMissingError);
    });
});
