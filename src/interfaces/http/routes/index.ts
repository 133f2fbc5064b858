import { Router } from "express";
import { healthRoutes } from "./health";
import { todoRoutes } from "./todos";
import type { HealthControllerDeps } from "../controllers/healthController";
import type { TodoControllerDeps } from "../controllers/todoController";

export type HttpRouterDeps = HealthControllerDeps & { todos: TodoControllerDeps };

export function makeHttpRouter(deps: HttpRouterDeps) {
  const router = Router();

  router.use(healthRoutes(deps));
  router.use(todoRoutes(deps.todos));

  return router;
}
