// =============================================================================
// SyncLog Model — one document per remote create/update issued by a routine
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';
import type { EntityType, ExternalSystem } from '../types';

export interface ISyncLog extends Document {
  operation: 'create' | 'update';
  sourceSystem: ExternalSystem;
  targetSystem: ExternalSystem;
  entityType: EntityType;
  entityId: string;
  status: 'success' | 'error';
  message: string;
  createdAt: Date;
}

const syncLogSchema = new Schema<ISyncLog>(
  {
    operation: { type: String, enum: ['create', 'update'], required: true },
    sourceSystem: { type: String, enum: ['wrike', 'hubspot'] satisfies ExternalSystem[], required: true },
    targetSystem: { type: String, enum: ['wrike', 'hubspot'] satisfies ExternalSystem[], required: true },
    entityType: { type: String, enum: ['company', 'contact'] satisfies EntityType[], required: true },
    entityId: { type: String, required: true },
    status: { type: String, enum: ['success', 'error'], required: true },
    message: { type: String, default: '' },
  },
  { timestamps: { createdAt: true, updatedAt: false }, collection: 'sync_logs' },
);

// TTL index: auto-delete after 90 days
syncLogSchema.index({ createdAt: 1 }, { expireAfterSeconds: 90 * 24 * 60 * 60 });

const SyncLog: Model<ISyncLog> = mongoose.model<ISyncLog>('SyncLog', syncLogSchema);
export default SyncLog;
