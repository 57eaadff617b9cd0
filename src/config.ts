import { DEFAULT_ROUTING_DB } from './application/cache_invalidation';

export interface FixConfig {
    bindHost: string;
    bindPort: number;
    apiToken: string;
    pgDsn: string;
    redisUrl: string;
    redisDb: number;
    mariadb: {
        host: string;
        port: number;
        user: string;
        password: string;
        database: string;
    };
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

type Env = Record<string, string | undefined>;

/**
 * Reads the service configuration from `env`.
 * Only API_TOKEN is required up front; store settings are checked when a store is first used.
 */
export function loadConfig(env: Env = process.env): FixConfig {
    const apiToken = env.API_TOKEN ?? '';
    if (!apiToken) {
        throw new ConfigError('API_TOKEN is required');
    }

    return {
        bindHost: env.BIND_HOST || '0.0.0.0',
        bindPort: readInt(env, 'BIND_PORT', 8000, 1, 65535),
        apiToken,
        pgDsn: env.PG_DSN ?? '',
        redisUrl: env.REDIS_URL ?? '',
        redisDb: readInt(env, 'REDIS_DB', DEFAULT_ROUTING_DB, 0, Number.MAX_SAFE_INTEGER),
        mariadb: {
            host: env.MDB_HOST ?? '',
            port: readInt(env, 'MDB_PORT', 3306, 1, 65535),
            user: env.MDB_USER ?? '',
            password: env.MDB_PASS ?? '',
            database: env.MDB_DB || 'dispatcher-api2',
        },
    };
}

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
    const raw = env[name];
    if (raw === undefined || raw === '') {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ConfigError(`${name} must be an integer between ${min}-${max}. Found: '${raw}'`);
    }
    return value;
}
