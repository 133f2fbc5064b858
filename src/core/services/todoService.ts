import type { ListQuery, NewTodo, Todo, UpdateTodo } from "../entities/todo";
import type { TodoRepository } from "../ports/TodoRepository";
import makeCreateTodo from "../use-cases/createTodo";
import makeDeleteTodo from "../use-cases/deleteTodo";
import makeGetTodo from "../use-cases/getTodo";
import makeListTodos from "../use-cases/listTodos";
import makeUpdateTodo from "../use-cases/updateTodo";

export interface TodoService {
  createTodo(input: NewTodo): Promise<Todo>;
  listTodos(query?: ListQuery): Promise<Todo[]>;
  getTodo(id: number): Promise<Todo>;
  updateTodo(id: number, changes: UpdateTodo): Promise<Todo>;
  deleteTodo(id: number): Promise<void>;
}

export function makeTodoService(repo: TodoRepository): TodoService {
  return {
    createTodo: makeCreateTodo(repo),
    listTodos: makeListTodos(repo),
    getTodo: makeGetTodo(repo),
    updateTodo: makeUpdateTodo(repo),
    deleteTodo: makeDeleteTodo(repo),
  };
}
