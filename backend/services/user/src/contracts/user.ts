// backend/services/user/src/contracts/user.ts
import { z } from "zod";
import { zObjectId } from "@shared/contracts/common";

/** Output DTO (what controllers send back) */
export const zUser = z.object({
  id: zObjectId,
  name: z.string(),
});
export type User = z.infer<typeof zUser>;

export const zUserList = z.array(zUser);

/** Create input (POST /users). The name is stored exactly as sent. */
export const zUserCreate = z
  .object({
    name: z.string().default(""),
  })
  .strip();
export type UserCreate = z.infer<typeof zUserCreate>;

export const zUserIdParam = z.object({ id: zObjectId });

export const zDeleted = z.object({ message: z.string() });
