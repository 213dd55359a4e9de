import { mkdirSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import Database from "better-sqlite3";

import { errorToMessage } from "@/utils/errors";

export interface MigrationRunner {
  runMigrations: () => Promise<void>;
}

export interface MigrationRunnerDeps {
  dbPath: string;
  schemaPath?: string;
  logger?: Pick<typeof console, "info" | "error">;
}

export function createMigrationRunner({
  dbPath,
  schemaPath,
  logger,
}: MigrationRunnerDeps): MigrationRunner {
  const resolvedSchemaPath =
    schemaPath ?? resolve(process.cwd(), "src/database/schema.sql");

  return {
    async runMigrations() {
      mkdirSync(dirname(dbPath), { recursive: true });
      const schemaSql = await readSchema(resolvedSchemaPath);
      const db = new Database(dbPath);

      try {
        db.exec("BEGIN;");
        db.exec(schemaSql);
        db.exec("COMMIT;");
        logger?.info?.("Database migrations applied");
      } catch (rawError) {
        if (db.inTransaction) {
          db.exec("ROLLBACK;");
        }
        logger?.error?.(`Database migration failed: ${errorToMessage(rawError)}`);
        throw new Error("Failed to apply database migrations", {
          cause: rawError,
        });
      } finally {
        db.close();
      }
    },
  };
}

async function readSchema(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (rawError) {
    throw new Error(
      `Failed to read schema file at ${path}: ${errorToMessage(rawError)}`,
      { cause: rawError }
    );
  }
}
