import { NotFoundError } from "../errors";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (id: number): Promise<void> => {
  const deleted = await repo.delete(id);
  if (!deleted) throw new NotFoundError("todo", id);
};
