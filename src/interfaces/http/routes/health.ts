import { Router } from "express";
import createHealthController, { HealthControllerDeps } from "../controllers/healthController";

export function healthRoutes(deps: HealthControllerDeps) {
  const router = Router();
  router.get("/health", createHealthController(deps));
  return router;
}
