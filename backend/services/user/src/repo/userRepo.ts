// backend/services/user/src/repo/userRepo.ts
import type { Types } from "mongoose";
import UserModel from "../models/User";
import { zUser, type User, type UserCreate } from "../contracts/user";

/**
 * Persistence seam for the user service. Handlers only see this interface,
 * so tests can pass an in-memory store.
 * Ids given to the repo are already validated 24-hex strings.
 */
export interface UserRepo {
  findAll(): Promise<User[]>;
  create(input: UserCreate): Promise<User>;
  /** true when a document was removed */
  deleteById(id: string): Promise<boolean>;
  countById(id: string): Promise<number>;
}

type UserRow = { _id: Types.ObjectId; name: string };

/** DB → domain; validated so callers never see malformed data. */
export function dbToDomain(row: UserRow): User {
  return zUser.parse({ id: row._id.toHexString(), name: row.name });
}

export function createMongoUserRepo(opts: { maxTimeMS: number }): UserRepo {
  const { maxTimeMS } = opts;

  return {
    async findAll() {
      const rows = await UserModel.find().maxTimeMS(maxTimeMS).lean();
      return rows.map(dbToDomain);
    },

    async create(input) {
      const doc = await new UserModel({ name: input.name }).save({ wtimeout: maxTimeMS });
      return dbToDomain(doc);
    },

    async deleteById(id) {
      const res = await UserModel.deleteOne({ _id: id }).maxTimeMS(maxTimeMS);
      return res.deletedCount > 0;
    },

    // Count, not fetch: the existence check only needs a boolean.
    async countById(id) {
      return UserModel.countDocuments({ _id: id }).maxTimeMS(maxTimeMS);
    },
  };
}
