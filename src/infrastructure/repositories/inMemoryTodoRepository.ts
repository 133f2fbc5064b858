import { applyField, applyNullable, normalizeListQuery } from "../../core/entities/todo";
import type { ListQuery, NewTodo, Todo, UpdateTodo } from "../../core/entities/todo";
import type { Clock, TodoRepository, TodoRepositoryOptions } from "../../core/ports/TodoRepository";
import { validateNewTodo, validateUpdateTodo } from "../../core/validation";

export default class InMemoryTodoRepository implements TodoRepository {
  private items = new Map<number, Todo>();
  private seq = 1;
  private readonly clock: Clock;

  constructor(options: TodoRepositoryOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  private nextId(): number {
    return this.seq++;
  }

  async create(input: NewTodo): Promise<Todo> {
    validateNewTodo(input);
    const now = this.clock().toISOString();
    const id = this.nextId();
    const todo: Todo = {
      id,
      title: input.title,
      description: input.description ?? null,
      completed: false,
      dueDate: input.dueDate ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.items.set(id, todo);
    return { ...todo };
  }

  async list(query?: ListQuery): Promise<Todo[]> {
    const { limit, offset, completed } = normalizeListQuery(query);
    return Array.from(this.items.values())
      .filter(t => completed === undefined || t.completed === completed)
      .sort((a, b) => a.id - b.id)
      .slice(offset, offset + limit)
      .map(t => ({ ...t }));
  }

  async getById(id: number): Promise<Todo | null> {
    const t = this.items.get(id);
    return t ? { ...t } : null;
  }

  async update(id: number, changes: UpdateTodo): Promise<Todo | null> {
    validateUpdateTodo(changes);
    const current = this.items.get(id);
    if (!current) return null;
    const updated: Todo = {
      ...current,
      title: applyField(changes.title, current.title),
      description: applyNullable(changes.description, current.description),
      completed: applyField(changes.completed, current.completed),
      dueDate: applyNullable(changes.dueDate, current.dueDate),
      updatedAt: this.clock().toISOString(),
    };
    this.items.set(id, updated);
    return { ...updated };
  }

  async delete(id: number): Promise<boolean> {
    return this.items.delete(id);
  }
}
