import { normalizeListQuery } from "../../core/entities/todo";
import type { ListQuery, NewTodo, Todo, UpdateTodo } from "../../core/entities/todo";
import { AppError, StorageError } from "../../core/errors";
import type { Clock, TodoRepository, TodoRepositoryOptions } from "../../core/ports/TodoRepository";
import { validateNewTodo, validateUpdateTodo } from "../../core/validation";
import type { SqliteDatabase } from "../db/sqlite";

interface TodoRow {
  id: number;
  title: string;
  description: string | null;
  completed: number;
  due_date: string | null;
  created_at: string;
  updated_at: string;
}

type SqlValue = string | number | null;

const COLUMNS = "id, title, description, completed, due_date, created_at, updated_at";

function toTodo(row: TodoRow): Todo {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    completed: row.completed === 1,
    dueDate: row.due_date,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

// The caller owns the handle. Every write is a single statement.
export default class SqliteTodoRepository implements TodoRepository {
  private readonly clock: Clock;

  constructor(private readonly db: SqliteDatabase, options: TodoRepositoryOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  private execute<T>(operation: string, run: () => T): Promise<T> {
    try {
      return Promise.resolve(run());
    } catch (err) {
      if (err instanceof AppError) return Promise.reject(err);
      return Promise.reject(new StorageError(`failed to ${operation} todo`, err));
    }
  }

  async create(input: NewTodo): Promise<Todo> {
    validateNewTodo(input);
    const now = this.clock().toISOString();

    return this.execute("create", () => {
      const row = this.db
        .prepare<[string, SqlValue, SqlValue, string, string], TodoRow>(
          `INSERT INTO todos (title, description, completed, due_date, created_at, updated_at)
           VALUES (?, ?, 0, ?, ?, ?)
           RETURNING ${COLUMNS}`
        )
        .get(input.title, input.description ?? null, input.dueDate ?? null, now, now);
      if (!row) throw new Error("insert returned no row");
      return toTodo(row);
    });
  }

  async list(query?: ListQuery): Promise<Todo[]> {
    const { limit, offset, completed } = normalizeListQuery(query);
    const params: Record<string, SqlValue> = { limit, offset };
    let where = "";
    if (completed !== undefined) {
      where = "WHERE completed = @completed";
      params.completed = completed ? 1 : 0;
    }

    return this.execute("list", () =>
      this.db
        .prepare<Record<string, SqlValue>, TodoRow>(
          `SELECT ${COLUMNS} FROM todos ${where} ORDER BY id ASC LIMIT @limit OFFSET @offset`
        )
        .all(params)
        .map(toTodo)
    );
  }

  async getById(id: number): Promise<Todo | null> {
    return this.execute("read", () => {
      const row = this.db.prepare<[number], TodoRow>(`SELECT ${COLUMNS} FROM todos WHERE id = ?`).get(id);
      return row ? toTodo(row) : null;
    });
  }

  async update(id: number, changes: UpdateTodo): Promise<Todo | null> {
    validateUpdateTodo(changes);

    const assignments = ["updated_at = @updated_at"];
    const params: Record<string, SqlValue> = { id, updated_at: this.clock().toISOString() };

    if (changes.title.kind === "set") {
      assignments.push("title = @title");
      params.title = changes.title.value;
    }
    if (changes.description.kind !== "unset") {
      assignments.push("description = @description");
      params.description = changes.description.kind === "set" ? changes.description.value : null;
    }
    if (changes.completed.kind === "set") {
      assignments.push("completed = @completed");
      params.completed = changes.completed.value ? 1 : 0;
    }
    if (changes.dueDate.kind !== "unset") {
      assignments.push("due_date = @due_date");
      params.due_date = changes.dueDate.kind === "set" ? changes.dueDate.value : null;
    }

    // The WHERE clause is the existence check; no row back means no such id.
    return this.execute("update", () => {
      const row = this.db
        .prepare<Record<string, SqlValue>, TodoRow>(
          `UPDATE todos SET ${assignments.join(", ")} WHERE id = @id RETURNING ${COLUMNS}`
        )
        .get(params);
      return row ? toTodo(row) : null;
    });
  }

  async delete(id: number): Promise<boolean> {
    return this.execute("delete", () => this.db.prepare<[number]>("DELETE FROM todos WHERE id = ?").run(id).changes > 0);
  }
}
