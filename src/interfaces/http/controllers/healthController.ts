import { Request, Response } from "express";

export interface HealthControllerDeps {
  isStorageReady: () => boolean;
}

export default function createHealthController(deps: HealthControllerDeps) {
  return (_req: Request, res: Response) => {
    if (!deps.isStorageReady()) {
      return res.status(503).json({ status: "unavailable", storage: "down" });
    }
    return res.status(200).json({ status: "ok", storage: "up", uptime: process.uptime() });
  };
}
