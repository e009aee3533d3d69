// backend/services/post/src/models/Post.ts
import { Schema, model } from "mongoose";

export interface PostRecord {
  user_id: string;
  title: string;
  content: string;
}

const PostSchema = new Schema<PostRecord>(
  {
    user_id: { type: String, required: true, index: true },
    title: { type: String, default: "" },
    content: { type: String, default: "" },
  },
  {
    collection: "posts",
    strict: true,
    versionKey: false,
  }
);

const PostModel = model<PostRecord>("Post", PostSchema);
export default PostModel;
