// backend/services/post/src/repo/postRepo.ts
import type { Types } from "mongoose";
import PostModel from "../models/Post";
import { zPost, type Post, type PostCreate } from "../contracts/post";

export interface PostRepo {
  findByUserId(userId: string): Promise<Post[]>;
  create(input: PostCreate): Promise<Post>;
  /** true when a document was removed */
  deleteById(id: string): Promise<boolean>;
}

type PostRow = {
  _id: Types.ObjectId;
  user_id?: unknown;
  title?: unknown;
  content?: unknown;
};

/** Rows written outside this service may not match the contract. */
export class PostDecodeError extends Error {
  constructor(public readonly postId: string) {
    super(`cannot decode post ${postId}`);
    this.name = "PostDecodeError";
  }
}

export function dbToDomain(row: PostRow): Post {
  const id = row._id.toHexString();
  const parsed = zPost.safeParse({
    id,
    user_id: row.user_id,
    title: row.title,
    content: row.content,
  });
  if (!parsed.success) throw new PostDecodeError(id);
  return parsed.data;
}

export function createMongoPostRepo(opts: { maxTimeMS: number }): PostRepo {
  const { maxTimeMS } = opts;

  return {
    async findByUserId(userId) {
      const rows = await PostModel.find({ user_id: userId }).maxTimeMS(maxTimeMS).lean();
      return rows.map(dbToDomain);
    },

    async create(input) {
      const doc = await new PostModel({
        user_id: input.user_id,
        title: input.title,
        content: input.content,
      }).save({ wtimeout: maxTimeMS });
      return dbToDomain(doc);
    },

    async deleteById(id) {
      const res = await PostModel.deleteOne({ _id: id }).maxTimeMS(maxTimeMS);
      return res.deletedCount > 0;
    },
  };
}
