import { EnpProfile } from './enp_profile';
import { ProvisioningRow } from './models';

/**
 * Narrow contracts for the three stores this service reconciles.
 * Each store hands out a session per operation; callers MUST close it.
 * `connect()` is where missing connection settings are reported.
 */

export interface NumbersSession {
    /**
     * Reassigns every row whose dn is in `dns` to `profile` in one bulk statement.
     * Returns the dns the store reports as updated; absent rows are skipped.
     */
    reassign(dns: string[], profile: EnpProfile): Promise<string[]>;

    close(): Promise<void>;
}

export interface INumbersStore {
    connect(): Promise<NumbersSession>;
}

export interface RoutingCacheSession {
    selectDatabase(index: number): Promise<void>;

    /**
     * Deletes all keys in a single round-trip.
     * Returns one count (0 or 1) per key, in key order.
     */
    batchDelete(keys: string[]): Promise<number[]>;

    close(): Promise<void>;
}

export interface IRoutingCache {
    connect(): Promise<RoutingCacheSession>;
}

/**
 * A provisioning session runs inside one local transaction, opened on connect.
 */
export interface ProvisioningSession {
    findByTargets(targets: string[]): Promise<ProvisioningRow[]>;

    /**
     * Returns the row count the store reports as deleted.
     */
    deleteByTargets(targets: string[]): Promise<number>;

    commit(): Promise<void>;
    rollback(): Promise<void>;
    close(): Promise<void>;
}

export interface IProvisioningStore {
    connect(): Promise<ProvisioningSession>;
}
