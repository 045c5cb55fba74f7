// =============================================================================
// ChangeTracking Model — queue of detected record changes
// =============================================================================
// One document per (source, recordId, detectedAt). The unique index turns a
// re-detection of the same change instant into a no-op insert.
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';
import type { ChangeStatus, ChangeType, ExternalSystem } from '../types';

export interface IChangeTracking extends Document {
  changeId: number;
  source: ExternalSystem;
  recordId: string;
  recordName: string;
  changeType: ChangeType;
  detectedAt: Date;
  status: ChangeStatus;
  syncedAt: Date | null;
  errorMessage: string | null;
}

const changeTrackingSchema = new Schema<IChangeTracking>(
  {
    changeId: { type: Number, required: true, unique: true },
    source: { type: String, enum: ['wrike', 'hubspot'] satisfies ExternalSystem[], required: true },
    recordId: { type: String, required: true },
    recordName: { type: String, default: '' },
    changeType: { type: String, enum: ['create', 'update'] satisfies ChangeType[], default: 'update' },
    detectedAt: { type: Date, required: true },
    status: {
      type: String,
      enum: ['pending', 'synced', 'failed'] satisfies ChangeStatus[],
      default: 'pending',
    },
    syncedAt: { type: Date, default: null },
    errorMessage: { type: String, default: null },
  },
  { collection: 'change_tracking' },
);

changeTrackingSchema.index({ source: 1, recordId: 1, detectedAt: 1 }, { unique: true });
changeTrackingSchema.index({ status: 1, detectedAt: 1 });

const ChangeTracking: Model<IChangeTracking> = mongoose.model<IChangeTracking>(
  'ChangeTracking',
  changeTrackingSchema,
);
export default ChangeTracking;
