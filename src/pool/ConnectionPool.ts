/**
 * mysql-advisor - Connection Pool Manager
 *
 * Wraps a single-connection mysql2 pool for the diagnostic session with
 * query statistics and graceful shutdown support.
 */

import mysql from 'mysql2/promise';
import type { Pool } from 'mysql2/promise';
import type { ConnectionConfig, PoolStats } from '../types/index.js';
import {
    AuthenticationError,
    ConnectionError,
    PoolError,
    QueryError
} from '../types/index.js';
import { logger } from '../utils/logger.js';

const ACCESS_DENIED = 'ER_ACCESS_DENIED_ERROR';

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): unknown {
    return error instanceof Error && 'code' in error ? error.code : undefined;
}

/**
 * Connection pool wrapper with statistics
 */
export class ConnectionPool {
    private pool: Pool | null = null;
    private readonly config: ConnectionConfig;
    private stats: PoolStats = {
        totalQueries: 0,
        failedQueries: 0
    };
    private isShuttingDown = false;

    constructor(config: ConnectionConfig) {
        this.config = config;
    }

    /**
     * Create the pool and verify the server accepts the credentials
     */
    async initialize(): Promise<void> {
        if (this.pool) {
            logger.warn('Connection pool already initialized');
            return;
        }

        const target = this.config.socketPath !== undefined
            ? { socketPath: this.config.socketPath }
            : { host: this.config.host, port: this.config.port };

        this.pool = mysql.createPool({
            ...target,
            user: this.config.user,
            password: this.config.password,

            // One session is all a diagnostic run needs
            connectionLimit: 1,
            waitForConnections: true,
            queueLimit: 0,

            connectTimeout: this.config.connectTimeout ?? 10000,
            charset: 'utf8mb4',

            // Numbers stay as the server formats them
            supportBigNumbers: true,
            bigNumberStrings: true
        });

        try {
            const connection = await this.pool.getConnection();
            connection.release();

            logger.info('Connection pool initialized', {
                ...target,
                user: this.config.user
            });
        } catch (error) {
            const pool = this.pool;
            this.pool = null;
            await pool.end().catch((endError: unknown) => {
                logger.debug('Error closing failed pool', { error: errorMessage(endError) });
            });

            const details = { ...target, user: this.config.user };
            if (errorCode(error) === ACCESS_DENIED) {
                throw new AuthenticationError(
                    `Access denied for user '${this.config.user}': ${errorMessage(error)}`,
                    details
                );
            }
            throw new ConnectionError(
                `Failed to connect to MySQL server: ${errorMessage(error)}`,
                details
            );
        }
    }

    /**
     * Run a text-protocol query and return its rows
     */
    async query(sql: string): Promise<unknown[]> {
        if (!this.pool) {
            throw new PoolError('Connection pool not initialized');
        }
        if (this.isShuttingDown) {
            throw new PoolError('Connection pool is shutting down');
        }

        this.stats.totalQueries++;

        try {
            const [rows] = await this.pool.query(sql);
            return Array.isArray(rows) ? rows : [];
        } catch (error) {
            this.stats.failedQueries++;
            throw new QueryError(`Query failed: ${errorMessage(error)}`, {
                sql,
                code: errorCode(error)
            });
        }
    }

    getStats(): PoolStats {
        return { ...this.stats };
    }

    /**
     * Gracefully shutdown the pool
     */
    async shutdown(): Promise<void> {
        if (!this.pool) {
            return;
        }

        this.isShuttingDown = true;
        logger.debug('Shutting down connection pool...');

        try {
            await this.pool.end();
            this.pool = null;
            logger.debug('Connection pool shut down', { ...this.stats });
        } catch (error) {
            logger.error('Error shutting down connection pool', { error: errorMessage(error) });
            throw error;
        }
    }
}
