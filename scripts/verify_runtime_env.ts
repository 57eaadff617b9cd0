import * as dotenv from 'dotenv';
import * as path from 'path';
import { loadConfig } from '../src/config';

// 1. Load ENV
const envPath = path.resolve(__dirname, '../.env');
console.log(`[VERIFY] Loading .env from: ${envPath}`);
dotenv.config({ path: envPath });

// 2. Parse config (API_TOKEN, ports, REDIS_DB)
let failures = 0;
try {
    const config = loadConfig();
    console.log(`[PASS] Config parsed. Bind: ${config.bindHost}:${config.bindPort}, REDIS_DB: ${config.redisDb}`);

    // 3. Store settings are only checked on first use; report them here
    const checks: Array<[string, boolean]> = [
        ['PG_DSN', config.pgDsn !== ''],
        ['REDIS_URL', config.redisUrl !== ''],
        ['MDB_HOST/MDB_USER/MDB_DB', config.mariadb.host !== '' && config.mariadb.user !== '' && config.mariadb.database !== ''],
    ];

    for (const [name, present] of checks) {
        if (present) {
            console.log(`[PASS] ${name} is set`);
        } else {
            console.error(`[FAIL] ${name} is missing`);
            failures++;
        }
    }
} catch (error: unknown) {
    console.error(`[FAIL] ${error instanceof Error ? error.message : String(error)}`);
    failures++;
}

if (failures > 0) {
    console.error(`[VERDICT] FAIL: ${failures} checks failed.`);
    process.exit(1);
} else {
    console.log('[VERDICT] PASS: All environment runtime checks passed.');
    process.exit(0);
}
