import { NextFunction, Request, Response } from "express";
import { ZodError } from "zod";
import { NotFoundError, StorageError, ValidationError } from "../../../core/errors";

function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);

  if (err instanceof ValidationError) {
    return res.status(422).json({ error: err.message, field: err.field });
  }
  if (err instanceof NotFoundError) {
    return res.status(404).json({ error: "Not Found" });
  }
  if (err instanceof ZodError) {
    return res.status(400).json({
      error: "Invalid request",
      issues: err.issues.map(issue => ({ path: issue.path.join("."), message: issue.message })),
    });
  }
  if (isJsonParseError(err)) {
    return res.status(400).json({ error: "Invalid JSON" });
  }

  if (err instanceof StorageError) {
    console.error(`${err.message}:`, err.cause);
  } else {
    console.error(err);
  }
  return res.status(500).json({ error: "Internal Server Error" });
}
