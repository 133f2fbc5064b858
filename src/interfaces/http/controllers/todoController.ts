import { NextFunction, Request, Response } from "express";
import type { TodoService } from "../../../core/services/todoService";
import {
  createTodoBodySchema,
  idParamSchema,
  listTodosQuerySchema,
  presentTodo,
  toNewTodo,
  toUpdateTodo,
  updateTodoBodySchema,
} from "../schemas/todoSchemas";

export type TodoControllerDeps = TodoService;

type Handler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not catch rejected handlers; hand them to the error middleware.
const handle = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

export default function createTodoController(deps: TodoControllerDeps) {
  return {
    list: handle(async (req, res) => {
      const query = listTodosQuerySchema.parse(req.query);
      const items = await deps.listTodos(query);
      return res.status(200).json({ data: items.map(presentTodo) });
    }),

    get: handle(async (req, res) => {
      const item = await deps.getTodo(idParamSchema.parse(req.params.id));
      return res.status(200).json({ data: presentTodo(item) });
    }),

    create: handle(async (req, res) => {
      const body = createTodoBodySchema.parse(req.body);
      const created = await deps.createTodo(toNewTodo(body));
      return res.status(201).json({ data: presentTodo(created) });
    }),

    update: handle(async (req, res) => {
      const id = idParamSchema.parse(req.params.id);
      const body = updateTodoBodySchema.parse(req.body);
      const updated = await deps.updateTodo(id, toUpdateTodo(body));
      return res.status(200).json({ data: presentTodo(updated) });
    }),

    remove: handle(async (req, res) => {
      await deps.deleteTodo(idParamSchema.parse(req.params.id));
      return res.sendStatus(204);
    }),
  };
}
