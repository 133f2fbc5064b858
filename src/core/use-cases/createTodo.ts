import type { NewTodo } from "../entities/todo";
import type { TodoRepository } from "../ports/TodoRepository";
import { normalizeDueDate, validateNewTodo } from "../validation";

export default (repo: TodoRepository) => async (input: NewTodo) => {
  const cleaned: NewTodo = { title: input.title.trim() };
  if (input.description !== undefined) cleaned.description = input.description.trim();
  if (input.dueDate !== undefined) cleaned.dueDate = input.dueDate;

  validateNewTodo(cleaned);
  if (cleaned.dueDate !== undefined) cleaned.dueDate = normalizeDueDate(cleaned.dueDate);

  return repo.create(cleaned);
};
