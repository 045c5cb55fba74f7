// =============================================================================
// SyncState Model — key/value watermarks per sync direction
// =============================================================================
import mongoose, { Document, Schema, Model } from 'mongoose';

export interface ISyncState extends Document {
  key: string;
  value: string;
  updatedAt: Date;
}

const syncStateSchema = new Schema<ISyncState>(
  {
    key: { type: String, required: true, unique: true },
    value: { type: String, required: true },
  },
  { timestamps: true, collection: 'sync_state' },
);

const SyncState: Model<ISyncState> = mongoose.model<ISyncState>('SyncState', syncStateSchema);
export default SyncState;
