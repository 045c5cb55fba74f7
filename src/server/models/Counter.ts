// =============================================================================
// Counter Model — auto-incrementing numeric ids for the log collections
// =============================================================================
import mongoose, { Schema, Model } from 'mongoose';

export interface ICounter {
  _id: string;
  seq: number;
}

const counterSchema = new Schema<ICounter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, default: 0 },
  },
  { collection: 'counters', versionKey: false },
);

const Counter: Model<ICounter> = mongoose.model<ICounter>('Counter', counterSchema);

/** Atomically reserves the next id in the named sequence. */
export async function nextSequence(name: string): Promise<number> {
  const doc = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true },
  ).lean();
  if (!doc) throw new Error(`Counter ${name} could not be incremented`);
  return doc.seq;
}

export default Counter;
