import mongoose, { Schema, Document, Types } from 'mongoose';

export type StrategyEventName =
  | 'ConfigurationChanged'
  | 'LockCreated'
  | 'LockReleased'
  | 'PerformanceFeeCharged'
  | 'HighWaterMarkUpdated';

export interface IStrategyEvent extends Document {
  _id: Types.ObjectId;
  type: StrategyEventName;
  /** User or caller the event concerns. */
  subject: string;
  /** Event fields with bigints stored as decimal strings. */
  payload: Record<string, unknown>;
  /** Strategy clock (unix seconds) at commit. */
  emittedAt: number;
  createdAt: Date;
}

const strategyEventSchema = new Schema<IStrategyEvent>(
  {
    type: {
      type: String,
      enum: ['ConfigurationChanged', 'LockCreated', 'LockReleased', 'PerformanceFeeCharged', 'HighWaterMarkUpdated'],
      required: true,
      index: true,
    },
    subject: { type: String, required: true, index: true },
    payload: { type: Schema.Types.Mixed, default: {} },
    emittedAt: { type: Number, required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

strategyEventSchema.index({ subject: 1, createdAt: -1 });
strategyEventSchema.index({ createdAt: -1 });

export const StrategyEvent = mongoose.model<IStrategyEvent>('StrategyEvent', strategyEventSchema);
