import { buildPreview, toPreviewFields } from '../domain/preview_builder';
import { profileFor } from '../domain/enp_profile';
import { EnpFixResult, FixRequest } from '../domain/models';
import { INumbersStore } from '../domain/stores';
import { withSession } from './store_session';

/**
 * Op A: hands a range of numbers back to an ENP profile in the relational numbers store.
 */
export class EnpReassignment {
    constructor(private readonly numbers: INumbersStore) { }

    async execute(request: FixRequest): Promise<EnpFixResult> {
        const preview = buildPreview(request.input);
        const profile = profileFor(request.enpTarget);

        const result: EnpFixResult = {
            dry_run: request.dryRun,
            enp_target: request.enpTarget,
            ...toPreviewFields(preview),
            system_id: profile.systemId,
            nprn: profile.nprnId,
        };

        if (request.dryRun) {
            console.log(`[EnpFix] DRY RUN: ${preview.count} dns -> ${request.enpTarget}`);
            return result;
        }

        const updatedDns = await withSession('numbers', this.numbers, session =>
            session.reassign(preview.dns, profile)
        );

        console.log(`[EnpFix] UPDATED: ${updatedDns.length}/${preview.count} dns -> ${request.enpTarget}`);
        return { ...result, updated_dns: updatedDns };
    }
}
