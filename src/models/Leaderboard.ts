import mongoose from 'mongoose';
import { StoredRecord } from './StoredRecord';

// _id is `${monthYear}_${userId}`
const leaderboardSchema = new mongoose.Schema<StoredRecord>({
  _id: { type: String, required: true },
  _version: { type: Number, required: true, min: 1 },
  userId: { type: String, required: true },
  displayName: { type: String, default: '' },
  xp: { type: Number, default: 0, min: 0 },
  level: { type: Number, default: 1, min: 1 },
  avatarURL: { type: String },
  lastUpdated: { type: Date, default: Date.now },
  monthYear: { type: String, required: true }
}, { versionKey: false });

leaderboardSchema.index({ monthYear: 1, xp: -1 });

export default mongoose.model<StoredRecord>('Leaderboard', leaderboardSchema, 'leaderboard');
