/**
 * mysql-advisor - In-memory Adapter
 *
 * DatabaseAdapter that serves a fixed ServerState, for pipeline tests
 * without a server.
 */

import { DatabaseAdapter } from '../../adapters/DatabaseAdapter.js';
import type { ConnectionConfig, ServerState, TableSizeRow } from '../../types/index.js';
import { createServerState } from './snapshot.js';

/**
 * Tables are keyed by database; the fixture's tables live in "app"
 */
export class FakeAdapter extends DatabaseAdapter {
    readonly type = 'mysql' as const;
    readonly name = 'Fake Adapter';

    readonly connectCalls: ConnectionConfig[] = [];
    disconnectCount = 0;

    private readonly databases: Map<string, TableSizeRow[]>;

    constructor(
        private readonly state: ServerState = createServerState(),
        databases?: Record<string, TableSizeRow[]>
    ) {
        super();
        this.databases = new Map(Object.entries(databases ?? { app: state.tables }));
    }

    async connect(config: ConnectionConfig): Promise<void> {
        this.connectCalls.push(config);
        this.connected = true;
    }

    async disconnect(): Promise<void> {
        this.disconnectCount++;
        this.connected = false;
    }

    async getVariables(): Promise<Record<string, string>> {
        return { ...this.state.variables };
    }

    async getStatus(): Promise<Record<string, string>> {
        return { ...this.state.status };
    }

    async getEngines(): Promise<Record<string, string>> {
        return { ...this.state.engines };
    }

    async listDatabases(): Promise<string[]> {
        return Array.from(this.databases.keys());
    }

    async getTableStatus(database: string): Promise<TableSizeRow[]> {
        return this.databases.get(database) ?? [];
    }
}
