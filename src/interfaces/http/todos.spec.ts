import request from "supertest";
import type { Express } from "express";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { makeApp } from "../../app";
import { makeTodoService } from "../../core/services/todoService";
import { closeDatabase, openDatabase, runMigrations, SqliteDatabase } from "../../infrastructure/db/sqlite";
import SqliteTodoRepository from "../../infrastructure/repositories/sqliteTodoRepository";

describe("todo HTTP API", () => {
  let db: SqliteDatabase;
  let app: Express;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    db = openDatabase("sqlite::memory:");
    runMigrations(db);
    app = makeApp({ todos: makeTodoService(new SqliteTodoRepository(db)) });
  });

  afterEach(() => {
    closeDatabase(db);
    vi.restoreAllMocks();
  });

  async function createTodo(body: object) {
    const res = await request(app).post("/api/v1/todos").send(body);
    expect(res.status).toBe(201);
    return res.body.data;
  }

  it("creates a todo and returns it in snake_case", async () => {
    const res = await request(app).post("/api/v1/todos").send({ title: "Task", description: "desc" });

    expect(res.status).toBe(201);
    expect(res.body.data).toMatchObject({
      id: 1,
      title: "Task",
      description: "desc",
      completed: false,
      due_date: null,
    });
    expect(res.body.data.created_at).toBe(res.body.data.updated_at);
  });

  it("answers 422 when a field breaks a length rule", async () => {
    const res = await request(app).post("/api/v1/todos").send({ title: "" });

    expect(res.status).toBe(422);
    expect(res.body).toEqual({ error: "title must be between 1 and 200 characters", field: "title" });
  });

  it("answers 400 when the body has the wrong shape", async () => {
    const res = await request(app).post("/api/v1/todos").send({ description: "no title" });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("Invalid request");
    expect(res.body.issues[0].path).toBe("title");
  });

  it("answers 400 for a due date that is not RFC3339", async () => {
    const res = await request(app).post("/api/v1/todos").send({ title: "t", due_date: "tomorrow" });

    expect(res.status).toBe(400);
    expect(res.body.issues).toEqual([{ path: "due_date", message: "must be an RFC3339 timestamp" }]);
  });

  it("answers 400 for malformed JSON", async () => {
    const res = await request(app)
      .post("/api/v1/todos")
      .set("Content-Type", "application/json")
      .send('{"title":');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Invalid JSON" });
  });

  it("gets a todo by id", async () => {
    const created = await createTodo({ title: "Find me", due_date: "2025-01-02T03:04:05Z" });

    const res = await request(app).get(`/api/v1/todos/${created.id}`);

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual(created);
    expect(res.body.data.due_date).toBe("2025-01-02T03:04:05Z");
  });

  it("answers 404 for an unknown id and 400 for a non-numeric one", async () => {
    const missing = await request(app).get("/api/v1/todos/999");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ error: "Not Found" });

    const invalid = await request(app).get("/api/v1/todos/abc");
    expect(invalid.status).toBe(400);
  });

  it("lists with paging and the completed filter", async () => {
    for (let i = 1; i <= 5; i++) await createTodo({ title: `todo ${i}` });
    await request(app).put("/api/v1/todos/2").send({ completed: true });

    const page = await request(app).get("/api/v1/todos").query({ limit: 2, offset: 2 });
    expect(page.status).toBe(200);
    expect(page.body.data.map((t: { title: string }) => t.title)).toEqual(["todo 3", "todo 4"]);

    const done = await request(app).get("/api/v1/todos").query({ completed: "true" });
    expect(done.body.data.map((t: { id: number }) => t.id)).toEqual([2]);

    const all = await request(app).get("/api/v1/todos");
    expect(all.body.data).toHaveLength(5);
  });

  it("answers an empty page for an offset past every row", async () => {
    await createTodo({ title: "only" });

    const res = await request(app).get("/api/v1/todos?offset=1e20");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ data: [] });
  });

  it("treats empty paging parameters as absent", async () => {
    for (let i = 1; i <= 3; i++) await createTodo({ title: `todo ${i}` });

    const res = await request(app).get("/api/v1/todos?limit=&offset=");

    expect(res.status).toBe(200);
    expect(res.body.data).toHaveLength(3);
  });

  it("keeps the full precision of a due date", async () => {
    const created = await createTodo({ title: "precise", due_date: "2025-01-02T03:04:05.123456Z" });

    expect(created.due_date).toBe("2025-01-02T03:04:05.123456Z");
  });

  it("answers 422 for a due date whose UTC year is before 0000", async () => {
    const res = await request(app).post("/api/v1/todos").send({ title: "t", due_date: "0000-01-01T00:30:00+01:00" });

    expect(res.status).toBe(422);
    expect(res.body.field).toBe("due_date");
  });

  it("rejects an unknown completed filter value", async () => {
    const res = await request(app).get("/api/v1/todos").query({ completed: "maybe" });

    expect(res.status).toBe(400);
  });

  it("clears a field sent as null and keeps an omitted one", async () => {
    const first = await createTodo({ title: "first", description: "keep me" });
    const second = await createTodo({ title: "second", description: "drop me" });

    const kept = await request(app).patch(`/api/v1/todos/${first.id}`).send({ completed: true });
    const cleared = await request(app).put(`/api/v1/todos/${second.id}`).send({ description: null });

    expect(kept.status).toBe(200);
    expect(kept.body.data).toMatchObject({ description: "keep me", completed: true });
    expect(cleared.status).toBe(200);
    expect(cleared.body.data).toMatchObject({ description: null, completed: false });
  });

  it("refuses a null title", async () => {
    const created = await createTodo({ title: "named" });

    const res = await request(app).put(`/api/v1/todos/${created.id}`).send({ title: null });

    expect(res.status).toBe(400);
  });

  it("answers 404 when updating an unknown id and 422 for a bad title", async () => {
    const missing = await request(app).put("/api/v1/todos/999").send({ title: "x" });
    expect(missing.status).toBe(404);

    const created = await createTodo({ title: "named" });
    const invalid = await request(app).put(`/api/v1/todos/${created.id}`).send({ title: "a".repeat(201) });
    expect(invalid.status).toBe(422);
  });

  it("deletes a todo", async () => {
    const created = await createTodo({ title: "bye" });

    const res = await request(app).delete(`/api/v1/todos/${created.id}`);
    expect(res.status).toBe(204);

    expect((await request(app).get(`/api/v1/todos/${created.id}`)).status).toBe(404);
    expect((await request(app).delete(`/api/v1/todos/${created.id}`)).status).toBe(404);
  });

  it("answers 500 without leaking storage details", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    db.exec("DROP TABLE todos");

    const res = await request(app).get("/api/v1/todos");

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal Server Error" });
  });

  it("reports health", async () => {
    const res = await request(app).get("/api/v1/health");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "ok", storage: "up" });
  });

  it("reports unavailable storage", async () => {
    const degraded = makeApp({ todos: makeTodoService(new SqliteTodoRepository(db)), isStorageReady: () => false });

    const res = await request(degraded).get("/api/v1/health");

    expect(res.status).toBe(503);
    expect(res.body).toEqual({ status: "unavailable", storage: "down" });
  });

  it("serves the OpenAPI document", async () => {
    const res = await request(app).get("/docs-json");

    expect(res.status).toBe(200);
    expect(res.body.openapi).toBe("3.0.3");
    expect(Object.keys(res.body.paths)).toEqual(["/health", "/todos", "/todos/{id}"]);
  });
});
