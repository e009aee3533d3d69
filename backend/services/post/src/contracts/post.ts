// backend/services/post/src/contracts/post.ts
import { z } from "zod";
import { zObjectId } from "@shared/contracts/common";

/** Output DTO */
export const zPost = z.object({
  id: zObjectId,
  user_id: z.string(),
  title: z.string(),
  content: z.string(),
});
export type Post = z.infer<typeof zPost>;

/** GET /posts/:userID response */
export const zPostList = z.object({
  user_id: z.string(),
  posts: z.array(zPost),
});

/**
 * Create input (POST /posts).
 * user_id is only checked for presence here; the user service decides if it is real.
 */
export const zPostCreate = z
  .object({
    user_id: z.string().min(1, "user_id is required"),
    title: z.string().default(""),
    content: z.string().default(""),
  })
  .strip();
export type PostCreate = z.infer<typeof zPostCreate>;

export const zUserIdParam = z.object({ userID: z.string().min(1) });
export const zPostIdParam = z.object({ postID: zObjectId });

export const zDeleted = z.object({ message: z.string() });
