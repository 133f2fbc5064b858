import 'dotenv/config';
import { makeApp } from './app';
import { loadConfig } from './config';
import { makeTodoService } from './core/services/todoService';
import { closeDatabase, openDatabase, runMigrations, SqliteDatabase } from './infrastructure/db/sqlite';
import SqliteTodoRepository from './infrastructure/repositories/sqliteTodoRepository';

const config = loadConfig();

let db: SqliteDatabase;
try {
  db = openDatabase(config.databaseUrl);
  runMigrations(db);
} catch (err) {
  console.error(`Could not open database ${config.databaseUrl}:`, err);
  process.exit(1);
}

const app = makeApp({
  todos: makeTodoService(new SqliteTodoRepository(db)),
  isStorageReady: () => db.open,
  logFormat: config.logFormat,
});

const server = app.listen(config.port, () => {
  console.log(`Todo API on :${config.port} (database ${config.databaseUrl})`);
});

function shutdown(signal: NodeJS.Signals) {
  console.log(`${signal} received, shutting down`);
  server.close(err => {
    closeDatabase(db);
    if (err) {
      console.error(err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
