import { Field } from "../entities/todo";
import type { UpdateTodo } from "../entities/todo";
import { NotFoundError } from "../errors";
import type { TodoRepository } from "../ports/TodoRepository";
import { normalizeDueDate, validateUpdateTodo } from "../validation";

export default (repo: TodoRepository) => async (id: number, changes: UpdateTodo) => {
  const payload: UpdateTodo = {
    ...changes,
    title: changes.title.kind === "set" ? Field.set(changes.title.value.trim()) : changes.title,
    description: changes.description.kind === "set" ? Field.set(changes.description.value.trim()) : changes.description,
  };

  validateUpdateTodo(payload);
  if (payload.dueDate.kind === "set") payload.dueDate = Field.set(normalizeDueDate(payload.dueDate.value));

  const updated = await repo.update(id, payload);
  if (!updated) throw new NotFoundError("todo", id);
  return updated;
};
