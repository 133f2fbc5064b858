export interface Todo {
  id: number;
  title: string;
  description: string | null;
  completed: boolean;
  dueDate: string | null; // RFC3339
  createdAt: string; // RFC3339
  updatedAt: string; // RFC3339
}

export interface NewTodo {
  title: string;
  description?: string;
  dueDate?: string;
}

export type FieldUpdate<T> = { kind: "unset" } | { kind: "set"; value: T };

// "clear" writes null.
export type NullableFieldUpdate<T> = FieldUpdate<T> | { kind: "clear" };

export interface UpdateTodo {
  title: FieldUpdate<string>;
  description: NullableFieldUpdate<string>;
  completed: FieldUpdate<boolean>;
  dueDate: NullableFieldUpdate<string>;
}

export const Field = {
  unset: (): { kind: "unset" } => ({ kind: "unset" }),
  clear: (): { kind: "clear" } => ({ kind: "clear" }),
  set: <T>(value: T): { kind: "set"; value: T } => ({ kind: "set", value }),
};

export function makeUpdate(changes: Partial<UpdateTodo> = {}): UpdateTodo {
  return {
    title: changes.title ?? Field.unset(),
    description: changes.description ?? Field.unset(),
    completed: changes.completed ?? Field.unset(),
    dueDate: changes.dueDate ?? Field.unset(),
  };
}

export function applyNullable<T>(update: NullableFieldUpdate<T>, current: T | null): T | null {
  switch (update.kind) {
    case "unset":
      return current;
    case "clear":
      return null;
    case "set":
      return update.value;
  }
}

export function applyField<T>(update: FieldUpdate<T>, current: T): T {
  return update.kind === "set" ? update.value : current;
}

export interface ListQuery {
  limit?: number;
  offset?: number;
  completed?: boolean;
}

export interface NormalizedListQuery {
  limit: number;
  offset: number;
  completed?: boolean;
}

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 200;

// Larger offsets do not fit a SQLite integer.
const MAX_LIST_OFFSET = Number.MAX_SAFE_INTEGER;

export function normalizeListQuery(query: ListQuery = {}): NormalizedListQuery {
  const limit = Number.isFinite(query.limit) ? Math.trunc(query.limit ?? DEFAULT_LIST_LIMIT) : DEFAULT_LIST_LIMIT;
  const offset = Number.isFinite(query.offset) ? Math.trunc(query.offset ?? 0) : 0;
  return {
    limit: Math.min(Math.max(limit, 1), MAX_LIST_LIMIT),
    offset: Math.min(Math.max(offset, 0), MAX_LIST_OFFSET),
    ...(query.completed === undefined ? {} : { completed: query.completed }),
  };
}
