import {
    InMemoryNumbersStore,
    InMemoryProvisioningStore,
    InMemoryRoutingCache,
} from '../../src/infrastructure/in_memory_stores';

describe('InMemory stores', () => {
    test('numbers: reassign skips unknown dns', async () => {
        const store = new InMemoryNumbersStore();
        store.seed({ dn: '41412345678', systemId: 1, nprnId: 2, reservedUntil: null, outportedAt: null });

        const session = await store.connect();
        const updated = await session.reassign(['41412345678', '41412345679'], { systemId: 510, nprnId: 98019 });

        expect(updated).toEqual(['41412345678']);
        expect(store.find('41412345678')?.systemId).toBe(510);
        expect(store.find('41412345679')).toBeNull();
    });

    test('routing cache: databases are isolated', async () => {
        const cache = new InMemoryRoutingCache();
        cache.set(1, 'k', 'v');

        const session = await cache.connect();
        await session.selectDatabase(2);
        expect(await session.batchDelete(['k'])).toEqual([0]);

        await session.selectDatabase(1);
        expect(await session.batchDelete(['k', 'k'])).toEqual([1, 0]);
    });

    test('provisioning: deletes apply on commit only', async () => {
        const store = new InMemoryProvisioningStore();
        store.seed({ id: 1, target_number: '0412345678', target_system: null, tenant: null, nprn: null, insert_date: null });

        const rolledBack = await store.connect();
        expect(await rolledBack.deleteByTargets(['0412345678'])).toBe(1);
        await rolledBack.rollback();
        expect(store.all()).toHaveLength(1);

        const committed = await store.connect();
        await committed.deleteByTargets(['0412345678']);
        await committed.commit();
        expect(store.all()).toEqual([]);
    });

    test('failures reject the named method', async () => {
        const store = new InMemoryProvisioningStore();
        store.failures.findByTargets = new Error('gone away');

        const session = await store.connect();
        await expect(session.findByTargets(['0412345678'])).rejects.toThrow('gone away');
        expect(store.calls).toEqual(['connect', 'findByTargets']);
    });
});
