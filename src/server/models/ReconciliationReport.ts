// =============================================================================
// ReconciliationReport Model — one aggregate document per auditor run
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';
import type { ReconciliationDetails } from '../types';

export interface IReconciliationReport extends Document {
  reportId: number;
  runAt: Date;
  wrikeTotal: number;
  hubspotTotal: number;
  matched: number;
  wrikeOnly: number;
  hubspotOnly: number;
  mismatched: number;
  autoFixed: number;
  status: 'completed' | 'failed';
  errorMessage: string | null;
  details: ReconciliationDetails;
}

const reconciliationReportSchema = new Schema<IReconciliationReport>(
  {
    reportId: { type: Number, required: true, unique: true },
    runAt: { type: Date, required: true },
    wrikeTotal: { type: Number, default: 0 },
    hubspotTotal: { type: Number, default: 0 },
    matched: { type: Number, default: 0 },
    wrikeOnly: { type: Number, default: 0 },
    hubspotOnly: { type: Number, default: 0 },
    mismatched: { type: Number, default: 0 },
    autoFixed: { type: Number, default: 0 },
    status: { type: String, enum: ['completed', 'failed'], default: 'completed' },
    errorMessage: { type: String, default: null },
    details: { type: Schema.Types.Mixed, default: { mismatches: [], wrikeOnly: [], hubspotOnly: [] } },
  },
  { collection: 'reconciliation_reports' },
);

// Keep a year of audit history
reconciliationReportSchema.index({ runAt: 1 }, { expireAfterSeconds: 365 * 24 * 60 * 60 });

const ReconciliationReport: Model<IReconciliationReport> = mongoose.model<IReconciliationReport>(
  'ReconciliationReport',
  reconciliationReportSchema,
);
export default ReconciliationReport;
