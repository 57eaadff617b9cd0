import { INumbersStore, IRoutingCache, IProvisioningStore } from '../domain/stores';
import { FixRequest, EnpFixResult, NprnFixResult, DispFixResult } from '../domain/models';
import { EnpReassignment } from './enp_reassignment';
import { CacheInvalidation } from './cache_invalidation';
import { ProvisioningCleanup } from './provisioning_cleanup';

export type FixKind = 'enp' | 'nprn' | 'disp';

export interface FixResultByKind {
    enp: EnpFixResult;
    nprn: NprnFixResult;
    disp: DispFixResult;
}

export type FixResult = FixResultByKind[FixKind];

export interface FixStores {
    numbers: INumbersStore;
    routingCache: IRoutingCache;
    provisioning: IProvisioningStore;
}

/**
 * The three reconciliation entry points, wired to their stores.
 */
export class FixOperations {
    private readonly enp: EnpReassignment;
    private readonly nprn: CacheInvalidation;
    private readonly disp: ProvisioningCleanup;

    constructor(stores: FixStores, routingDb?: number) {
        this.enp = new EnpReassignment(stores.numbers);
        this.nprn = new CacheInvalidation(stores.routingCache, routingDb);
        this.disp = new ProvisioningCleanup(stores.provisioning);
    }

    run(kind: FixKind, request: FixRequest): Promise<FixResult> {
        switch (kind) {
            case 'enp': return this.enp.execute(request);
            case 'nprn': return this.nprn.execute(request);
            case 'disp': return this.disp.execute(request);
        }
    }
}
