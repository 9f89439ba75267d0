/**
 * mysql-advisor - DatabaseAdapter Unit Tests
 *
 * Tests for the abstract DatabaseAdapter base class methods.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { DatabaseAdapter } from "../DatabaseAdapter.js";
import type { ConnectionConfig, TableSizeRow } from "../../types/index.js";

// Create a concrete implementation for testing
class TestAdapter extends DatabaseAdapter {
  readonly type = "mysql" as const;
  readonly name = "Test Adapter";

  readonly getTableStatusMock = vi.fn(
    async (database: string): Promise<TableSizeRow[]> => [
      { engine: "InnoDB", dataLength: database.length },
    ],
  );

  async connect(_config: ConnectionConfig): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async getVariables(): Promise<Record<string, string>> {
    return { version: "8.0.36" };
  }

  async getStatus(): Promise<Record<string, string>> {
    return { Questions: "10" };
  }

  async getEngines(): Promise<Record<string, string>> {
    return { InnoDB: "DEFAULT" };
  }

  async listDatabases(): Promise<string[]> {
    return ["information_schema", "app", "Performance_Schema", "mysql"];
  }

  async getTableStatus(database: string): Promise<TableSizeRow[]> {
    return this.getTableStatusMock(database);
  }
}

describe("DatabaseAdapter", () => {
  let adapter: TestAdapter;

  beforeEach(() => {
    adapter = new TestAdapter();
  });

  describe("isConnected", () => {
    it("should track the connection state", async () => {
      expect(adapter.isConnected()).toBe(false);
      await adapter.connect({
        type: "mysql",
        host: "localhost",
        port: 3306,
        user: "root",
        password: "",
      });
      expect(adapter.isConnected()).toBe(true);
      await adapter.disconnect();
      expect(adapter.isConnected()).toBe(false);
    });
  });

  describe("collectServerState", () => {
    it("should assemble variables, status, engines and tables", async () => {
      const state = await adapter.collectServerState();

      expect(state).toEqual({
        variables: { version: "8.0.36" },
        status: { Questions: "10" },
        engines: { InnoDB: "DEFAULT" },
        tables: [
          { engine: "InnoDB", dataLength: 3 },
          { engine: "InnoDB", dataLength: 5 },
        ],
      });
    });

    it("should skip system schemas", async () => {
      await adapter.collectServerState();
      expect(adapter.getTableStatusMock.mock.calls).toEqual([["app"], ["mysql"]]);
    });

    it("should propagate failures", async () => {
      adapter.getTableStatusMock.mockRejectedValueOnce(new Error("lost"));
      await expect(adapter.collectServerState()).rejects.toThrow("lost");
    });
  });
});
