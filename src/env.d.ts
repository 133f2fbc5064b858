declare namespace NodeJS {
  interface ProcessEnv {
    PORT?: string;          // HTTP port, default 3000
    DATABASE_URL?: string;  // e.g. sqlite:data/todos.db or sqlite::memory:
    LOG_FORMAT?: string;    // morgan format, default "dev"
  }
}
