// =============================================================================
// SyncActivityChange Model — one document per field compared in a cycle
// =============================================================================
// Written whether or not the value changed, so the trail shows the field
// was checked.
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';
import type { EntityType, ExternalSystem, RecordAction } from '../types';

export interface ISyncActivityChange extends Document {
  changeId: number;
  activityId: number;
  companyName: string;
  wrikeCompanyId: string;
  hubspotCompanyId: string | null;
  entityType: EntityType;
  fieldName: string;
  systemChanged: ExternalSystem;
  oldValue: string | null;
  newValue: string | null;
  changed: boolean;
  action: RecordAction;
  createdAt: Date;
}

const syncActivityChangeSchema = new Schema<ISyncActivityChange>(
  {
    changeId: { type: Number, required: true, unique: true },
    activityId: { type: Number, required: true, index: true },
    companyName: { type: String, default: '' },
    wrikeCompanyId: { type: String, required: true },
    hubspotCompanyId: { type: String, default: null },
    entityType: { type: String, enum: ['company', 'contact'] satisfies EntityType[], required: true },
    fieldName: { type: String, required: true },
    systemChanged: { type: String, enum: ['wrike', 'hubspot'] satisfies ExternalSystem[], required: true },
    oldValue: { type: String, default: null },
    newValue: { type: String, default: null },
    changed: { type: Boolean, default: true },
    action: { type: String, enum: ['created', 'updated', 'skipped'] satisfies RecordAction[], required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false }, collection: 'sync_activity_changes' },
);

const SyncActivityChange: Model<ISyncActivityChange> = mongoose.model<ISyncActivityChange>(
  'SyncActivityChange',
  syncActivityChangeSchema,
);
export default SyncActivityChange;
