import * as dotenv from 'dotenv';
import { FixClient, FixApiError, UnauthorizedError } from '../src/api/fix_client';
import { EnpTarget } from '../src/domain/enp_profile';

// Load environment variables (API token, base URL)
dotenv.config();

async function main() {
    // 1. Configuration
    const apiToken = process.env.API_TOKEN || 'YOUR_API_TOKEN';
    const baseUrl = process.env.FIX_BASE_URL || 'http://localhost:8000';

    console.log(`🔌 Connecting to ${baseUrl}...`);

    const client = new FixClient(apiToken, baseUrl);

    try {
        // 2. Preview first: nothing is written in dry-run mode
        console.log('\n🔎 Previewing ENP reassignment...');
        const preview = await client.fixEnp('0412345678-681', { dryRun: true, enpTarget: EnpTarget.NXP2 });
        console.log(`   ${preview.count} dns -> system ${preview.system_id} / nprn ${preview.nprn}`);
        console.log(`   ${preview.expanded_dns.join(', ')}`);

        // 3. Provisioning rows that a live cleanup would remove
        const disp = await client.fixDisp('0412345678-681', { dryRun: true });
        if (disp.dry_run) {
            console.log(`\n🧹 Would delete ${disp.would_delete_count} provisioning rows`);
        }

        // UNCOMMENT TO APPLY
        /*
        const applied = await client.fixEnp('0412345678-681', { enpTarget: EnpTarget.NXP2 });
        console.log(`   ✅ Updated: ${applied.updated_dns?.length ?? 0}`);
        */
    } catch (error: unknown) {
        if (error instanceof UnauthorizedError) {
            console.error('⚠️  Token rejected. Check API_TOKEN.');
        } else if (error instanceof FixApiError) {
            console.error(`❌ API Error [${error.kind ?? error.statusCode}]: ${error.message}`);
        } else {
            throw error;
        }
    }
}

main().catch(console.error);
