import { buildPreview, toPreviewFields } from '../domain/preview_builder';
import { FixRequest, NprnFixResult } from '../domain/models';
import { IRoutingCache } from '../domain/stores';
import { withSession } from './store_session';

export const DEFAULT_ROUTING_DB = 9;

/**
 * Op B: drops cached routing entries so they are rebuilt from the numbers store.
 */
export class CacheInvalidation {
    constructor(
        private readonly cache: IRoutingCache,
        private readonly database: number = DEFAULT_ROUTING_DB
    ) { }

    async execute(request: FixRequest): Promise<NprnFixResult> {
        const preview = buildPreview(request.input);

        const result: NprnFixResult = {
            dry_run: request.dryRun,
            ...toPreviewFields(preview),
            redis_db: this.database,
        };

        if (request.dryRun) {
            console.log(`[NprnFix] DRY RUN: ${preview.count} keys in db ${this.database}`);
            return result;
        }

        const deletedCounts = await withSession('routing-cache', this.cache, async session => {
            await session.selectDatabase(this.database);
            return session.batchDelete(preview.cacheKeys);
        });

        const deleted = deletedCounts.reduce((sum, n) => sum + n, 0);
        console.log(`[NprnFix] DELETED: ${deleted}/${preview.count} keys in db ${this.database}`);
        return { ...result, deleted_counts: deletedCounts };
    }
}
