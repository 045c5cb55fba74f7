// =============================================================================
// CompanyMapping Model — Wrike company task ↔ HubSpot company (identity map)
// =============================================================================
// Collection name: company_id_map
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';
import type { MappingStatus } from '../types';

export interface ICompanyMapping extends Document {
  wrikeCompanyId: string;
  /** Null once released to another Wrike task */
  hubspotCompanyId: string | null;
  companyName: string;
  syncStatus: MappingStatus;
  lastSyncedAt: Date | null;
  notes: string;
  createdAt: Date;
  updatedAt: Date;
}

const companyMappingSchema = new Schema<ICompanyMapping>(
  {
    wrikeCompanyId: { type: String, required: true, unique: true },
    hubspotCompanyId: { type: String, default: null },
    companyName: { type: String, default: '' },
    syncStatus: {
      type: String,
      enum: ['active', 'inactive'] satisfies MappingStatus[],
      default: 'active',
    },
    lastSyncedAt: { type: Date, default: null },
    notes: { type: String, default: '' },
  },
  { timestamps: true, collection: 'company_id_map' },
);

// Unique only while set — released rows carry null
companyMappingSchema.index(
  { hubspotCompanyId: 1 },
  { unique: true, partialFilterExpression: { hubspotCompanyId: { $type: 'string' } } },
);

const CompanyMapping: Model<ICompanyMapping> = mongoose.model<ICompanyMapping>(
  'CompanyMapping',
  companyMappingSchema,
);
export default CompanyMapping;
