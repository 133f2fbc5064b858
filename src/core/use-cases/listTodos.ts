import { normalizeListQuery } from "../entities/todo";
import type { ListQuery } from "../entities/todo";
import type { TodoRepository } from "../ports/TodoRepository";

export default (repo: TodoRepository) => async (query: ListQuery = {}) => {
  return repo.list(normalizeListQuery(query));
};
