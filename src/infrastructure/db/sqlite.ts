import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type SqliteDatabase = Database.Database;

export const MEMORY_DATABASE = ":memory:";
export const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, "../../../migrations");

// sqlite:data/todos.db -> data/todos.db, sqlite::memory:?cache=shared -> :memory:
export function resolveDatabasePath(databaseUrl: string): string {
  const withoutScheme = databaseUrl.replace(/^sqlite:(\/\/)?/, "");
  const [filename] = withoutScheme.split("?");
  return filename === "" || filename === MEMORY_DATABASE ? MEMORY_DATABASE : filename;
}

export function openDatabase(databaseUrl: string): SqliteDatabase {
  const filename = resolveDatabasePath(databaseUrl);
  const inMemory = filename === MEMORY_DATABASE;

  if (!inMemory) {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename, { timeout: 5000 });
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  return db;
}

export function runMigrations(db: SqliteDatabase, dir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    )
  `);

  const applied = new Set(
    db.prepare<[], { name: string }>("SELECT name FROM _migrations").all().map(row => row.name)
  );
  const record = db.prepare<[string, string]>("INSERT INTO _migrations (name, applied_at) VALUES (?, ?)");

  const pending = fs
    .readdirSync(dir)
    .filter(file => file.endsWith(".sql") && !applied.has(file))
    .sort();

  for (const file of pending) {
    const sql = fs.readFileSync(path.join(dir, file), "utf8");
    db.transaction(() => {
      db.exec(sql);
      record.run(file, new Date().toISOString());
    })();
    console.log(`Applied migration ${file}`);
  }

  return pending;
}

export function closeDatabase(db: SqliteDatabase): void {
  if (db.open) db.close();
}
