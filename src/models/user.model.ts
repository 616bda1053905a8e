import { Schema, model, type InferSchemaType } from "mongoose";

export const DEFAULT_AVATAR = "/media/user/default_avatar.jpg";

const UserSchema = new Schema({
  email: { type: String, required: true, unique: true, lowercase: true, trim: true },
  username: { type: String, required: true, unique: true, trim: true },
  firstName: { type: String, required: true, trim: true },
  lastName: { type: String, default: "", trim: true },
  passwordHash: { type: String, default: null },
  isStaff: { type: Boolean, default: false },
  bio: { type: String, default: "", maxlength: 700 },
  avatar: { type: String, default: DEFAULT_AVATAR },
  tags: { type: [String], default: [] },
  createdAt: { type: Date, default: Date.now },
});

export type User = InferSchemaType<typeof UserSchema>;
export const UserModel = model("User", UserSchema);
export default UserModel;
