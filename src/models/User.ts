import mongoose from 'mongoose';
import { StoredRecord } from './StoredRecord';

const xpEventSchema = new mongoose.Schema({
  id: { type: String, required: true },
  event: { type: String, required: true },
  xp: { type: Number, required: true },
  timestamp: { type: Date, required: true },
  subjectRef: { type: String },
  details: { type: String }
}, { _id: false });

const userSchema = new mongoose.Schema<StoredRecord>({
  _id: { type: String, required: true },
  _version: { type: Number, required: true, min: 1 },
  displayName: { type: String, default: '', maxlength: 50, trim: true },
  avatar: { type: String, default: '' },
  xp: { type: Number, default: 0, min: 0 },
  level: { type: Number, default: 1 },
  xpHistory: { type: [xpEventSchema], default: [] },
  weeklyXP: { type: Number, default: 0 },
  lastXPUpdate: { type: Date }
}, { timestamps: true, versionKey: false, strict: false });

export default mongoose.model<StoredRecord>('User', userSchema, 'users');
