// =============================================================================
// SyncActivity Model — one document per sync cycle (parent of the change log)
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';
import type { ActivityStatus, ActivityType } from '../types';

export interface ISyncActivity extends Document {
  activityId: number;
  activityType: ActivityType;
  startedAt: Date;
  completedAt: Date | null;
  status: ActivityStatus;
  companiesProcessed: number;
  contactsProcessed: number;
  changesMade: number;
  errorCount: number;
  summary: string | null;
}

const syncActivitySchema = new Schema<ISyncActivity>(
  {
    activityId: { type: Number, required: true, unique: true },
    activityType: {
      type: String,
      enum: ['full_sync', 'change_detection', 'single_record', 'reconciliation'] satisfies ActivityType[],
      required: true,
    },
    startedAt: { type: Date, required: true },
    completedAt: { type: Date, default: null },
    status: {
      type: String,
      enum: ['running', 'completed', 'failed'] satisfies ActivityStatus[],
      default: 'running',
    },
    companiesProcessed: { type: Number, default: 0 },
    contactsProcessed: { type: Number, default: 0 },
    changesMade: { type: Number, default: 0 },
    errorCount: { type: Number, default: 0 },
    summary: { type: String, default: null },
  },
  { collection: 'sync_activities' },
);

const SyncActivity: Model<ISyncActivity> = mongoose.model<ISyncActivity>('SyncActivity', syncActivitySchema);
export default SyncActivity;
