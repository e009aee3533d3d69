// backend/services/user/test/users.spec.ts
import request from "supertest";
import { Types } from "mongoose";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Express } from "express";
import { zProblem } from "@shared/contracts/common";
import { buildUserApp } from "../src/app";
import { BrokenUserRepo, MemoryUserRepo } from "./helpers/memoryUserRepo";

const missingId = () => new Types.ObjectId().toHexString();

let repo: MemoryUserRepo;
let app: Express;

beforeEach(() => {
  repo = new MemoryUserRepo();
  app = buildUserApp({ repo });
});

describe("GET /ping", () => {
  it("answers with plain text", async () => {
    const r = await request(app).get("/ping").expect(200);
    expect(r.headers["content-type"]).toMatch(/^text\/plain/);
    expect(r.text).toBe("user pong");
  });
});

describe("POST /users", () => {
  it("creates a user with a server-assigned id → 201", async () => {
    const r = await request(app).post("/users").send({ name: "Alice" }).expect(201);
    expect(r.body.name).toBe("Alice");
    expect(r.body.id).toMatch(/^[a-f0-9]{24}$/);
    expect(repo.rows.get(r.body.id)).toEqual({ id: r.body.id, name: "Alice" });
  });

  it("ignores a client-supplied id", async () => {
    const clientId = missingId();
    const r = await request(app).post("/users").send({ id: clientId, name: "Bob" }).expect(201);
    expect(r.body.id).not.toBe(clientId);
  });

  it("missing name → 201 with an empty name", async () => {
    const r = await request(app).post("/users").send({}).expect(201);
    expect(r.body).toEqual({ id: r.body.id, name: "" });
  });

  it("stores the name exactly as sent", async () => {
    const r = await request(app).post("/users").send({ name: "  Alice  " }).expect(201);
    expect(r.body.name).toBe("  Alice  ");
    expect(repo.rows.get(r.body.id)?.name).toBe("  Alice  ");
  });

  it("accepts long names", async () => {
    const name = "a".repeat(201);
    const r = await request(app).post("/users").send({ name }).expect(201);
    expect(r.body.name).toBe(name);
  });

  it("non-string name → 400 BAD_REQUEST", async () => {
    const r = await request(app).post("/users").send({ name: 42 }).expect(400);
    const prob = zProblem.parse(r.body);
    expect(prob.code).toBe("BAD_REQUEST");
    expect(prob.errors?.[0]?.path).toBe("name");
    expect(repo.rows.size).toBe(0);
  });

  it("malformed JSON → 400 Problem", async () => {
    const r = await request(app)
      .post("/users")
      .set("Content-Type", "application/json")
      .send('{"name":')
      .expect(400);
    expect(r.headers["content-type"]).toMatch(/^application\/problem\+json/);
    expect(r.body.title).toBe("Request Error");
    expect(r.body.status).toBe(400);
    expect(r.body.type).toBe("about:blank");
  });
});

describe("GET /users", () => {
  it("returns [] for an empty store", async () => {
    const r = await request(app).get("/users").expect(200);
    expect(r.body).toEqual([]);
  });

  it("returns every stored user", async () => {
    const a = await repo.create({ name: "Alice" });
    const b = await repo.create({ name: "Bob" });
    const r = await request(app).get("/users").expect(200);
    expect(r.body).toEqual([a, b]);
  });
});

describe("DELETE /users/:id", () => {
  it("deletes an existing user → 200", async () => {
    const u = await repo.create({ name: "Alice" });
    const r = await request(app).delete(`/users/${u.id}`).expect(200);
    expect(r.body).toEqual({ message: "deleted successfully" });
    expect(repo.rows.has(u.id)).toBe(false);
  });

  it("unknown id → 404 user not found", async () => {
    const r = await request(app).delete(`/users/${missingId()}`).expect(404);
    const prob = zProblem.parse(r.body);
    expect(prob.code).toBe("NOT_FOUND");
    expect(prob.detail).toBe("user not found");
  });

  it("invalid id → 400 without touching the store", async () => {
    const spy = vi.spyOn(repo, "deleteById");
    const r = await request(app).delete("/users/not-an-id").expect(400);
    expect(zProblem.parse(r.body).code).toBe("BAD_REQUEST");
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("GET /users/exists/:id", () => {
  it("existing user → exists:true", async () => {
    const created = await request(app).post("/users").send({ name: "Alice" }).expect(201);
    const r = await request(app).get(`/users/exists/${created.body.id}`).expect(200);
    expect(r.body).toEqual({ id: created.body.id, exists: true });
  });

  it("no such user → 200 exists:false", async () => {
    const id = missingId();
    const r = await request(app).get(`/users/exists/${id}`).expect(200);
    expect(r.body).toEqual({ id, exists: false });
  });

  it("echoes the id as given, upper-case hex included", async () => {
    const id = missingId().toUpperCase();
    const r = await request(app).get(`/users/exists/${id}`).expect(200);
    expect(r.body).toEqual({ id, exists: false });
  });

  it("invalid id → 400 without touching the store", async () => {
    const spy = vi.spyOn(repo, "countById");
    await request(app).get("/users/exists/xyz").expect(400);
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("store failures", () => {
  const broken = () => buildUserApp({ repo: new BrokenUserRepo() });

  it("list → 500 Problem", async () => {
    const r = await request(broken()).get("/users").expect(500);
    const prob = zProblem.parse(r.body);
    expect(prob.title).toBe("Internal Server Error");
    expect(prob.detail).toBe("connection lost");
  });

  it("create → 500", async () => {
    await request(broken()).post("/users").send({ name: "Alice" }).expect(500);
  });

  it("delete → 500", async () => {
    await request(broken()).delete(`/users/${missingId()}`).expect(500);
  });

  it("exists → 500", async () => {
    await request(broken()).get(`/users/exists/${missingId()}`).expect(500);
  });
});

describe("unknown routes", () => {
  it("under /users → 404 Problem", async () => {
    const r = await request(app).get("/users/a/b").expect(404);
    const prob = zProblem.parse(r.body);
    expect(prob.code).toBe("NOT_FOUND");
    expect(prob.detail).toBe("Route not found");
  });

  it("elsewhere → bare 404", async () => {
    const r = await request(app).get("/nowhere").expect(404);
    expect(r.text).toBe("");
  });
});

describe("request ids", () => {
  it("echoes an incoming x-request-id", async () => {
    const r = await request(app).get("/users").set("x-request-id", "req-123").expect(200);
    expect(r.headers["x-request-id"]).toBe("req-123");
  });

  it("mints one when absent", async () => {
    const r = await request(app).delete(`/users/${missingId()}`).expect(404);
    expect(r.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
  });
});
