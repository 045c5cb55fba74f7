// =============================================================================
// ReconciliationIssue Model — append-only; `resolved` is set by operators only
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';
import type { EntityType, IssueType, ReconciliationIssueInput } from '../types';

export interface IReconciliationIssue extends Document {
  issueId: number;
  source: ReconciliationIssueInput['source'];
  entityType: EntityType;
  entityId: string;
  issueType: IssueType;
  detail: string;
  resolved: boolean;
  createdAt: Date;
}

const reconciliationIssueSchema = new Schema<IReconciliationIssue>(
  {
    issueId: { type: Number, required: true, unique: true },
    source: { type: String, enum: ['wrike', 'hubspot', 'reconciliation'], required: true },
    entityType: { type: String, enum: ['company', 'contact'] satisfies EntityType[], required: true },
    entityId: { type: String, required: true },
    issueType: {
      type: String,
      enum: ['sync_error', 'wrike_only', 'hubspot_only', 'field_mismatch', 'stale_mapping'] satisfies IssueType[],
      required: true,
    },
    detail: { type: String, default: '' },
    resolved: { type: Boolean, default: false },
  },
  { timestamps: { createdAt: true, updatedAt: false }, collection: 'reconciliation_issue' },
);

reconciliationIssueSchema.index({ resolved: 1, issueId: -1 });

const ReconciliationIssue: Model<IReconciliationIssue> = mongoose.model<IReconciliationIssue>(
  'ReconciliationIssue',
  reconciliationIssueSchema,
);
export default ReconciliationIssue;
