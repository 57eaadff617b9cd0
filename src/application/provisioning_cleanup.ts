import { buildPreview, toPreviewFields } from '../domain/preview_builder';
import { errorMessage, toStoreFailure } from '../domain/errors';
import { DispFixResult, FixRequest } from '../domain/models';
import { IProvisioningStore, ProvisioningSession } from '../domain/stores';
import { closeSession, openSession } from './store_session';

/**
 * Op C: removes stale cli_provisioning rows for a range of targets.
 *
 * The snapshot is read even in dry-run mode. Snapshot and delete are separate
 * statements with no lock in between, so deleted_count may differ from the
 * snapshot length when the table changes concurrently.
 */
export class ProvisioningCleanup {
    constructor(private readonly provisioning: IProvisioningStore) { }

    async execute(request: FixRequest): Promise<DispFixResult> {
        const preview = buildPreview(request.input);
        const echo = toPreviewFields(preview);

        const session = await openSession('provisioning', this.provisioning);
        try {
            const rows = await session.findByTargets(preview.targets);

            if (request.dryRun) {
                console.log(`[DispFix] DRY RUN: ${rows.length} rows for ${preview.count} targets`);
                return { dry_run: true, ...echo, would_delete_count: rows.length, would_delete_rows: rows };
            }

            const deletedCount = await session.deleteByTargets(preview.targets);
            await session.commit();

            console.log(`[DispFix] DELETED: ${deletedCount} rows (snapshot ${rows.length})`);
            return { dry_run: false, ...echo, deleted_count: deletedCount, deleted_rows: rows };
        } catch (error) {
            await this.rollback(session);
            throw toStoreFailure('provisioning', error);
        } finally {
            await closeSession('provisioning', session);
        }
    }

    private async rollback(session: ProvisioningSession): Promise<void> {
        try {
            await session.rollback();
        } catch (rollbackError: unknown) {
            // The original failure is what the caller sees.
            console.error(`[DispFix] ROLLBACK FAILED: ${errorMessage(rollbackError)}`);
        }
    }
}
