// backend/services/post/test/postRepo.spec.ts
import { Types } from "mongoose";
import request from "supertest";
import { describe, expect, it, vi } from "vitest";
import { buildPostApp } from "../src/app";
import { dbToDomain, PostDecodeError } from "../src/repo/postRepo";
import { MemoryPostRepo } from "./helpers/memoryPostRepo";
import { fakeUsers, USER_EXISTS } from "./helpers/fakeUsers";

describe("dbToDomain", () => {
  it("maps _id to a hex id", () => {
    const _id = new Types.ObjectId();
    expect(dbToDomain({ _id, user_id: "u1", title: "t", content: "c" })).toEqual({
      id: _id.toHexString(),
      user_id: "u1",
      title: "t",
      content: "c",
    });
  });

  it("rejects a stored row missing its title", () => {
    const _id = new Types.ObjectId();
    expect(() => dbToDomain({ _id, user_id: "u1", content: "c" })).toThrow(PostDecodeError);
  });

  it("an undecodable row surfaces as 500 on list", async () => {
    const repo = new MemoryPostRepo();
    const badId = new Types.ObjectId().toHexString();
    vi.spyOn(repo, "findByUserId").mockRejectedValue(new PostDecodeError(badId));
    const app = buildPostApp({ repo, users: fakeUsers(USER_EXISTS).users });

    const r = await request(app).get("/posts/u1").expect(500);
    expect(r.body.detail).toBe(`cannot decode post ${badId}`);
    expect(r.body.title).toBe("Internal Server Error");
  });
});
