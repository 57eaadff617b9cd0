import * as dotenv from 'dotenv';
import { ConfigError, FixConfig, loadConfig } from './config';
import { FixOperations } from './application/fix_operations';
import { FixController } from './http/fix_controller';
import { createFixApp } from './http/fix_app';
import { PostgresNumbersStore } from './infrastructure/postgres_numbers_store';
import { RedisRoutingCache } from './infrastructure/redis_routing_cache';
import { MysqlProvisioningStore } from './infrastructure/mysql_provisioning_store';

// 1. Load Config Early
dotenv.config();

let config: FixConfig;
try {
    config = loadConfig();
} catch (error: unknown) {
    if (error instanceof ConfigError) {
        console.error(`❌ STARTUP FATAL: ${error.message}`);
        process.exit(1);
    }
    throw error;
}

// 2. Infrastructure Wiring
const operations = new FixOperations(
    {
        numbers: new PostgresNumbersStore(config.pgDsn),
        routingCache: new RedisRoutingCache(config.redisUrl),
        provisioning: new MysqlProvisioningStore(config.mariadb),
    },
    config.redisDb
);

const app = createFixApp(new FixController(config.apiToken, operations));

app.listen(config.bindPort, config.bindHost, () => {
    console.log(`
🚀 Fix Server listening on http://${config.bindHost}:${config.bindPort}
👉 POST /fix/enp | /fix/nprn | /fix/disp (x-api-token required)
    `);
});
