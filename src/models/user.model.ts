import mongoose, { Schema, Document, Model } from 'mongoose';

export interface IUser extends Document {
  email: string;
  name: string;
  password: string;        // hashed
  verified: boolean;
  avatarUrl?: string;
  refreshTokenFingerprint: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>(
  {
    email: { type: String, required: true, unique: true, index: true, lowercase: true, trim: true },
    name: { type: String, required: true },
    password: { type: String, required: true },
    verified: { type: Boolean, default: false },
    avatarUrl: { type: String },
    refreshTokenFingerprint: { type: String, default: null },
  },
  { timestamps: true }
);

export const User: Model<IUser> = mongoose.model<IUser>('User', UserSchema);
