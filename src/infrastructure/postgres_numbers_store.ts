import pg from 'pg';
import { EnpProfile } from '../domain/enp_profile';
import { StoreConnectionMissingError } from '../domain/errors';
import { INumbersStore, NumbersSession } from '../domain/stores';

export const FAR_FUTURE_RESERVATION = '2050-01-01 00:00:00';

export const REASSIGN_SQL = `
    UPDATE numbers
    SET reservation_tstamp = $1,
        product_id = 1,
        system_id = $2,
        nprn = $3,
        outporting_tstamp = NULL,
        lastupdated_tstamp = NOW()
    WHERE dn = ANY($4)
    RETURNING dn`;

export class PostgresNumbersStore implements INumbersStore {
    constructor(private readonly dsn: string | undefined) { }

    async connect(): Promise<NumbersSession> {
        if (!this.dsn) {
            throw new StoreConnectionMissingError('numbers', 'PG_DSN');
        }

        const client = new pg.Client({ connectionString: this.dsn });
        await client.connect();
        return new PostgresNumbersSession(client);
    }
}

class PostgresNumbersSession implements NumbersSession {
    constructor(private readonly client: pg.Client) { }

    async reassign(dns: string[], profile: EnpProfile): Promise<string[]> {
        const { rows } = await this.client.query<{ dn: string }>(REASSIGN_SQL, [
            FAR_FUTURE_RESERVATION,
            profile.systemId,
            profile.nprnId,
            dns,
        ]);
        return rows.map(row => row.dn);
    }

    async close(): Promise<void> {
        await this.client.end();
    }
}
