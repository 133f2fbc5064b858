import { Router } from "express";
import createTodoController, { TodoControllerDeps } from "../controllers/todoController";

export function todoRoutes(deps: TodoControllerDeps) {
  const controller = createTodoController(deps);
  const router = Router();

  router.route("/todos").get(controller.list).post(controller.create);

  // PUT and PATCH share partial-update semantics.
  router
    .route("/todos/:id")
    .get(controller.get)
    .put(controller.update)
    .patch(controller.update)
    .delete(controller.remove);

  return router;
}
