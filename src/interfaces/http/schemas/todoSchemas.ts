import { z } from "zod";
import { Field } from "../../../core/entities/todo";
import type { NewTodo, NullableFieldUpdate, Todo, UpdateTodo } from "../../../core/entities/todo";

// Shape checks only. Length rules live in core/validation and answer 422.

const rfc3339 = z.string().datetime({ offset: true, message: "must be an RFC3339 timestamp" });

export const idParamSchema = z.coerce.number().int().positive();

export const createTodoBodySchema = z.object({
  title: z.string(),
  description: z.string().nullish(),
  due_date: rfc3339.nullish(),
});

// zod leaves keys missing from the input out of its output, so an absent key
// stays distinguishable from an explicit null.
export const updateTodoBodySchema = z.object({
  title: z.string().optional(),
  description: z.string().nullable().optional(),
  completed: z.boolean().optional(),
  due_date: rfc3339.nullable().optional(),
});

// `?limit=` means the same as leaving limit out.
const pagingParam = z.preprocess(
  value => (value === "" ? undefined : value),
  z.coerce.number().int().optional()
);

export const listTodosQuerySchema = z.object({
  limit: pagingParam,
  offset: pagingParam,
  completed: z
    .enum(["true", "false"])
    .transform(value => value === "true")
    .optional(),
});

export type CreateTodoBody = z.infer<typeof createTodoBodySchema>;
export type UpdateTodoBody = z.infer<typeof updateTodoBodySchema>;

export interface TodoResponse {
  id: number;
  title: string;
  description: string | null;
  completed: boolean;
  due_date: string | null;
  created_at: string;
  updated_at: string;
}

function toNullableUpdate<T>(value: T | null | undefined): NullableFieldUpdate<T> {
  if (value === undefined) return Field.unset();
  if (value === null) return Field.clear();
  return Field.set(value);
}

export function toNewTodo(body: CreateTodoBody): NewTodo {
  const input: NewTodo = { title: body.title };
  if (body.description != null) input.description = body.description;
  if (body.due_date != null) input.dueDate = body.due_date;
  return input;
}

export function toUpdateTodo(body: UpdateTodoBody): UpdateTodo {
  return {
    title: body.title === undefined ? Field.unset() : Field.set(body.title),
    description: toNullableUpdate(body.description),
    completed: body.completed === undefined ? Field.unset() : Field.set(body.completed),
    dueDate: toNullableUpdate(body.due_date),
  };
}

export function presentTodo(todo: Todo): TodoResponse {
  return {
    id: todo.id,
    title: todo.title,
    description: todo.description,
    completed: todo.completed,
    due_date: todo.dueDate,
    created_at: todo.createdAt,
    updated_at: todo.updatedAt,
  };
}
