// backend/services/shared/contracts/userExists.contract.ts
import { z } from "zod";

/**
 * Wire contract of the user existence check:
 *   GET /users/exists/:id → 200 { id, exists }
 * Served by the user service, consumed by the post service.
 */
export const zUserExists = z.object({
  id: z.string(),
  exists: z.boolean(),
});

export const userExistsPath = (id: string) => `/users/exists/${encodeURIComponent(id)}`;
