/**
 * Database Connection and Migration
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { migrate as drizzleMigrate } from 'drizzle-orm/better-sqlite3/migrator';
import * as schema from './schema.js';
import * as fs from 'fs';
import * as path from 'path';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  db: AppDatabase;
  sqlite: Database.Database;
  migrate(): void;
  close(): void;
}

export const MEMORY_DATABASE = ':memory:';

export function createDatabase(dbPath: string, migrationsFolder?: string): DatabaseConnection {
  if (dbPath !== MEMORY_DATABASE) {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  const db = drizzle(sqlite, { schema });

  // Default migrations folder is ./drizzle relative to project root (written by `drizzle-kit generate`)
  const defaultMigrationsFolder = path.resolve(process.cwd(), 'drizzle');

  return {
    db,
    sqlite,
    migrate() {
      const folder = migrationsFolder ?? defaultMigrationsFolder;
      drizzleMigrate(db, { migrationsFolder: folder });
    },
    close() {
      sqlite.close();
    },
  };
}

export * from './schema.js';
