import { EnpProfile } from '../domain/enp_profile';
import { ProvisioningRow } from '../domain/models';
import {
    INumbersStore,
    IProvisioningStore,
    IRoutingCache,
    NumbersSession,
    ProvisioningSession,
    RoutingCacheSession,
} from '../domain/stores';
import { FAR_FUTURE_RESERVATION } from './postgres_numbers_store';

/**
 * In-process stand-ins for the three stores.
 * Every call is appended to `calls`; a method listed in `failures` rejects with that error.
 */

export interface NumbersRow {
    dn: string;
    systemId: number;
    nprnId: number;
    reservedUntil: string | null;
    outportedAt: string | null;
}

type NumbersMethod = 'connect' | 'reassign' | 'close';

export class InMemoryNumbersStore implements INumbersStore {
    readonly calls: string[] = [];
    readonly failures: Partial<Record<NumbersMethod, Error>> = {};
    private rows: Map<string, NumbersRow> = new Map();

    seed(row: NumbersRow): void {
        this.rows.set(row.dn, { ...row });
    }

    find(dn: string): NumbersRow | null {
        const row = this.rows.get(dn);
        return row ? { ...row } : null;
    }

    async connect(): Promise<NumbersSession> {
        this.record('connect');
        return {
            reassign: async (dns: string[], profile: EnpProfile) => {
                this.record('reassign');
                const updated: string[] = [];
                for (const dn of dns) {
                    const row = this.rows.get(dn);
                    if (!row) continue;
                    row.systemId = profile.systemId;
                    row.nprnId = profile.nprnId;
                    row.reservedUntil = FAR_FUTURE_RESERVATION;
                    row.outportedAt = null;
                    updated.push(dn);
                }
                return updated;
            },
            close: async () => {
                this.record('close');
            },
        };
    }

    private record(method: NumbersMethod): void {
        this.calls.push(method);
        const failure = this.failures[method];
        if (failure) throw failure;
    }
}

type CacheMethod = 'connect' | 'selectDatabase' | 'batchDelete' | 'close';

export class InMemoryRoutingCache implements IRoutingCache {
    readonly calls: string[] = [];
    readonly failures: Partial<Record<CacheMethod, Error>> = {};
    private databases: Map<number, Map<string, string>> = new Map();

    set(database: number, key: string, value: string): void {
        this.database(database).set(key, value);
    }

    has(database: number, key: string): boolean {
        return this.database(database).has(key);
    }

    async connect(): Promise<RoutingCacheSession> {
        this.record('connect');
        let selected = 0;
        return {
            selectDatabase: async (index: number) => {
                this.record('selectDatabase');
                selected = index;
            },
            batchDelete: async (keys: string[]) => {
                this.record('batchDelete');
                const db = this.database(selected);
                return keys.map(key => (db.delete(key) ? 1 : 0));
            },
            close: async () => {
                this.record('close');
            },
        };
    }

    private database(index: number): Map<string, string> {
        let db = this.databases.get(index);
        if (!db) {
            db = new Map();
            this.databases.set(index, db);
        }
        return db;
    }

    private record(method: CacheMethod): void {
        this.calls.push(method);
        const failure = this.failures[method];
        if (failure) throw failure;
    }
}

type ProvisioningMethod = 'connect' | 'findByTargets' | 'deleteByTargets' | 'commit' | 'rollback' | 'close';

/**
 * Deletes are staged per session and only applied on commit.
 */
export class InMemoryProvisioningStore implements IProvisioningStore {
    readonly calls: string[] = [];
    readonly failures: Partial<Record<ProvisioningMethod, Error>> = {};
    private rows: ProvisioningRow[] = [];

    seed(...rows: ProvisioningRow[]): void {
        this.rows.push(...rows.map(row => ({ ...row })));
    }

    all(): ProvisioningRow[] {
        return this.rows.map(row => ({ ...row }));
    }

    async connect(): Promise<ProvisioningSession> {
        this.record('connect');
        let staged: Set<string> | null = null;

        return {
            findByTargets: async (targets: string[]) => {
                this.record('findByTargets');
                return this.rows
                    .filter(row => targets.includes(row.target_number))
                    .map(row => ({ ...row }));
            },
            deleteByTargets: async (targets: string[]) => {
                this.record('deleteByTargets');
                staged = new Set(targets);
                const pending = staged;
                return this.rows.filter(row => pending.has(row.target_number)).length;
            },
            commit: async () => {
                this.record('commit');
                const pending = staged;
                if (pending) {
                    this.rows = this.rows.filter(row => !pending.has(row.target_number));
                }
                staged = null;
            },
            rollback: async () => {
                this.record('rollback');
                staged = null;
            },
            close: async () => {
                this.record('close');
            },
        };
    }

    private record(method: ProvisioningMethod): void {
        this.calls.push(method);
        const failure = this.failures[method];
        if (failure) throw failure;
    }
}
