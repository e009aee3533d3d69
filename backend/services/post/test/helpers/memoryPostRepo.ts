// backend/services/post/test/helpers/memoryPostRepo.ts
import { Types } from "mongoose";
import type { PostRepo } from "../../src/repo/postRepo";
import type { Post, PostCreate } from "../../src/contracts/post";

export class MemoryPostRepo implements PostRepo {
  readonly rows = new Map<string, Post>();

  async findByUserId(userId: string): Promise<Post[]> {
    return [...this.rows.values()].filter((p) => p.user_id === userId);
  }

  async create(input: PostCreate): Promise<Post> {
    const post = { id: new Types.ObjectId().toHexString(), ...input };
    this.rows.set(post.id, post);
    return post;
  }

  async deleteById(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }
}
