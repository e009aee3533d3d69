// backend/services/post/src/controllers/handlers/deps.ts
import type { PostRepo } from "../../repo/postRepo";
import type { UserExistenceChecker } from "../../services/userClient";

export type PostHandlerDeps = {
  repo: PostRepo;
  users: UserExistenceChecker;
};
