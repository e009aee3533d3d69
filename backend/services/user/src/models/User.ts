// backend/services/user/src/models/User.ts
import { Schema, model } from "mongoose";

export interface UserRecord {
  name: string;
}

const UserSchema = new Schema<UserRecord>(
  {
    name: { type: String, default: "" },
  },
  {
    collection: "users",
    strict: true,
    versionKey: false,
  }
);

const UserModel = model<UserRecord>("User", UserSchema);
export default UserModel;
