import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import { join, resolve } from "node:path";

import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createMigrationRunner } from "@/database/migrations";

describe("createMigrationRunner", () => {
  let tmpDir: string;
  let dbPath: string;
  const schemaPath = resolve(process.cwd(), "src/database/schema.sql");

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), "flightplan-migration-"));
    dbPath = join(tmpDir, "bot.db");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("schema.sql に基づいてテーブルを作成し、再実行しても安全である", async () => {
    const logger = { info: vi.fn(), error: vi.fn() };
    const runner = createMigrationRunner({ dbPath, schemaPath, logger });

    await runner.runMigrations();

    const db = new Database(dbPath);

    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'tenant_configs'"
      )
      .all();
    expect(tables).toHaveLength(1);

    expect(() =>
      db.exec(`
        INSERT INTO tenant_configs (
          guild_id,
          destination_id,
          show_route,
          created_at,
          updated_at
        ) VALUES (
          '100000000000000001',
          '200000000000000002',
          2,
          '2025-01-01T00:00:00.000Z',
          '2025-01-01T00:00:00.000Z'
        )
      `)
    ).toThrow();

    db.close();

    await expect(runner.runMigrations()).resolves.toBeUndefined();
    expect(logger.info).toHaveBeenCalledWith("Database migrations applied");
    expect(logger.info).toHaveBeenCalledTimes(2);
  });

  it("スキーマファイルが存在しない場合にわかりやすいエラーを返す", async () => {
    const missingSchemaPath = resolve(tmpDir, "missing-schema.sql");
    const runner = createMigrationRunner({
      dbPath,
      schemaPath: missingSchemaPath,
    });

    await expect(runner.runMigrations()).rejects.toThrow(
      /Failed to read schema file/
    );
  });

  it("SQL が失敗した場合はロールバックしてラップしたエラーを投げる", async () => {
    const brokenSchemaPath = join(tmpDir, "broken.sql");
    const { writeFileSync } = await import("node:fs");
    writeFileSync(
      brokenSchemaPath,
      "CREATE TABLE ok_table (id TEXT); CREATE TABL broken;"
    );
    const logger = { info: vi.fn(), error: vi.fn() };
    const runner = createMigrationRunner({
      dbPath,
      schemaPath: brokenSchemaPath,
      logger,
    });

    await expect(runner.runMigrations()).rejects.toThrow(
      "Failed to apply database migrations"
    );
    expect(logger.error).toHaveBeenCalledTimes(1);

    const db = new Database(dbPath);
    const tables = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'ok_table'"
      )
      .all();
    expect(tables).toHaveLength(0);
    db.close();
  });
});
