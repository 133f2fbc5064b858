import type { ListQuery, NewTodo, Todo, UpdateTodo } from "../entities/todo";

export type Clock = () => Date;

export interface TodoRepositoryOptions {
  clock?: Clock;
}

export interface TodoRepository {
  create(input: NewTodo): Promise<Todo>;
  list(query?: ListQuery): Promise<Todo[]>;
  getById(id: number): Promise<Todo | null>;
  update(id: number, changes: UpdateTodo): Promise<Todo | null>;
  delete(id: number): Promise<boolean>;
}
