import { EnpTarget } from './enp_profile';
import { PreviewFields } from './preview_builder';

/**
 * A reconciliation request after transport parsing.
 */
export interface FixRequest {
    input: string;
    dryRun: boolean;
    enpTarget: EnpTarget;
}

/**
 * Snapshot of one cli_provisioning row, as read before a cleanup.
 */
export interface ProvisioningRow {
    id: number;
    target_number: string;
    target_system: string | null;
    tenant: string | null;
    nprn: number | null;
    insert_date: Date | null;
}

/**
 * Fields shared by every operation result.
 */
export interface FixResultBase extends PreviewFields {
    dry_run: boolean;
}

export interface EnpFixResult extends FixResultBase {
    enp_target: EnpTarget;
    system_id: number;
    nprn: number;
    updated_dns?: string[];
}

export interface NprnFixResult extends FixResultBase {
    redis_db: number;
    deleted_counts?: number[];
}

export type DispFixResult =
    | (FixResultBase & { dry_run: true; would_delete_count: number; would_delete_rows: ProvisioningRow[] })
    | (FixResultBase & { dry_run: false; deleted_count: number; deleted_rows: ProvisioningRow[] });
