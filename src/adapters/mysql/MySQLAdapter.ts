/**
 * mysql-advisor - MySQL Adapter
 *
 * Reads variables, status counters, engines and table sizes from a MySQL
 * server over a pooled session.
 */

import type { z } from 'zod';
import { DatabaseAdapter } from '../DatabaseAdapter.js';
import { ConnectionPool } from '../../pool/ConnectionPool.js';
import type { ConnectionConfig, TableSizeRow } from '../../types/index.js';
import { ConnectionError, QueryError } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import {
    DatabaseRowSchema,
    EngineRowSchema,
    NameValueRowSchema,
    TableStatusRowSchema
} from './types.js';
import type { NameValueRow } from './types.js';

/**
 * Quote an identifier for use in a SHOW statement
 */
export function quoteIdentifier(name: string): string {
    return `\`${name.replace(/`/g, '``')}\``;
}

function toRecord(rows: NameValueRow[]): Record<string, string> {
    return Object.fromEntries(rows.map((row) => [row.Variable_name, row.Value]));
}

/**
 * MySQL Database Adapter
 */
export class MySQLAdapter extends DatabaseAdapter {
    readonly type = 'mysql' as const;
    readonly name = 'MySQL Adapter';

    private pool: ConnectionPool | null = null;

    // =========================================================================
    // Connection Lifecycle
    // =========================================================================

    async connect(config: ConnectionConfig): Promise<void> {
        if (this.connected) {
            logger.warn('Already connected');
            return;
        }

        const pool = new ConnectionPool(config);
        await pool.initialize();
        this.pool = pool;
        this.connected = true;
        logger.info('MySQL adapter connected', {
            host: config.host,
            port: config.port,
            socketPath: config.socketPath
        });
    }

    async disconnect(): Promise<void> {
        if (!this.connected || !this.pool) {
            return;
        }

        const stats = this.pool.getStats();
        await this.pool.shutdown();
        this.pool = null;
        this.connected = false;
        logger.info('MySQL adapter disconnected', { ...stats });
    }

    // =========================================================================
    // Query Execution
    // =========================================================================

    /**
     * Run a query and validate each row against a schema
     */
    private async queryRows<T extends z.ZodTypeAny>(
        sql: string,
        schema: T
    ): Promise<z.output<T>[]> {
        if (!this.pool) {
            throw new ConnectionError('Not connected to database');
        }

        const rows = await this.pool.query(sql);
        return rows.map((row, index) => {
            const parsed = schema.safeParse(row);
            if (!parsed.success) {
                throw new QueryError(`Unexpected row shape from ${sql}`, {
                    sql,
                    row: index,
                    issues: parsed.error.issues.map((issue) => issue.message)
                });
            }
            return parsed.data;
        });
    }

    // =========================================================================
    // Server State
    // =========================================================================

    async getVariables(): Promise<Record<string, string>> {
        return toRecord(await this.queryRows('SHOW GLOBAL VARIABLES', NameValueRowSchema));
    }

    async getStatus(): Promise<Record<string, string>> {
        return toRecord(await this.queryRows('SHOW GLOBAL STATUS', NameValueRowSchema));
    }

    async getEngines(): Promise<Record<string, string>> {
        try {
            const rows = await this.queryRows('SHOW ENGINES', EngineRowSchema);
            return Object.fromEntries(rows.map((row) => [row.Engine, row.Support]));
        } catch (error) {
            if (!(error instanceof QueryError)) throw error;
            // Servers before 4.1 have no SHOW ENGINES; have_* variables cover them
            logger.debug('SHOW ENGINES unavailable', { error: error.message });
            return {};
        }
    }

    async listDatabases(): Promise<string[]> {
        const rows = await this.queryRows('SHOW DATABASES', DatabaseRowSchema);
        return rows.map((row) => row.Database);
    }

    async getTableStatus(database: string): Promise<TableSizeRow[]> {
        const rows = await this.queryRows(
            `SHOW TABLE STATUS FROM ${quoteIdentifier(database)}`,
            TableStatusRowSchema
        );
        return rows.map((row) => ({
            engine: row.Engine ?? '',
            dataLength: typeof row.Data_length === 'bigint'
                ? row.Data_length.toString()
                : row.Data_length ?? null
        }));
    }
}
