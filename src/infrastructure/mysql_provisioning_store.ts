import mysql, { Connection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { StoreConnectionMissingError } from '../domain/errors';
import { ProvisioningRow } from '../domain/models';
import { IProvisioningStore, ProvisioningSession } from '../domain/stores';

export interface MysqlProvisioningOptions {
    host?: string;
    port: number;
    user?: string;
    password?: string;
    database?: string;
}

interface ProvisioningRowPacket extends RowDataPacket {
    id: number;
    target_number: string;
    target_system: string | null;
    tenant: string | null;
    nprn: number | null;
    insert_date: Date | null;
}

export const SELECT_SQL =
    'SELECT id, target_number, target_system, tenant, nprn, insert_date ' +
    'FROM cli_provisioning WHERE target_number IN (?)';

export const DELETE_SQL = 'DELETE FROM cli_provisioning WHERE target_number IN (?)';

export class MysqlProvisioningStore implements IProvisioningStore {
    constructor(private readonly options: MysqlProvisioningOptions) { }

    async connect(): Promise<ProvisioningSession> {
        const { host, port, user, password, database } = this.options;
        if (!host || !user || !database) {
            throw new StoreConnectionMissingError('provisioning', 'MDB_HOST/MDB_USER/MDB_DB');
        }

        const connection = await mysql.createConnection({ host, port, user, password, database });
        try {
            await connection.beginTransaction();
        } catch (error) {
            // No session exists yet to close this connection.
            connection.destroy();
            throw error;
        }
        return new MysqlProvisioningSession(connection);
    }
}

class MysqlProvisioningSession implements ProvisioningSession {
    constructor(private readonly connection: Connection) { }

    async findByTargets(targets: string[]): Promise<ProvisioningRow[]> {
        // `IN (?)` with an array value expands to one placeholder per element.
        const [rows] = await this.connection.query<ProvisioningRowPacket[]>(SELECT_SQL, [targets]);
        return rows.map(row => ({
            id: row.id,
            target_number: row.target_number,
            target_system: row.target_system,
            tenant: row.tenant,
            nprn: row.nprn,
            insert_date: row.insert_date,
        }));
    }

    async deleteByTargets(targets: string[]): Promise<number> {
        const [result] = await this.connection.query<ResultSetHeader>(DELETE_SQL, [targets]);
        return result.affectedRows;
    }

    async commit(): Promise<void> {
        await this.connection.commit();
    }

    async rollback(): Promise<void> {
        await this.connection.rollback();
    }

    async close(): Promise<void> {
        await this.connection.end();
    }
}
