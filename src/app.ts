import express from "express";
import cors from "cors";
import morgan from "morgan";
import swaggerUi from "swagger-ui-express";
import apiSpec from "./docs/openapi.json";

import type { TodoService } from "./core/services/todoService";
import { makeHttpRouter } from "./interfaces/http/routes";
import { errorHandler } from "./interfaces/http/middlewares/errorHandler";

export const API_PREFIX = "/api/v1";

export interface AppDeps {
  todos: TodoService;
  isStorageReady?: () => boolean;
  /** morgan format; request logging is off when omitted. */
  logFormat?: string;
}

export function makeApp(deps: AppDeps) {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  if (deps.logFormat) app.use(morgan(deps.logFormat));

  // API Docs (Swagger UI)
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(apiSpec));
  app.get("/docs-json", (_req, res) => res.json(apiSpec));

  app.use(
    API_PREFIX,
    makeHttpRouter({ todos: deps.todos, isStorageReady: deps.isStorageReady ?? (() => true) })
  );

  // Error handler (fallback)
  app.use(errorHandler);

  return app;
}
