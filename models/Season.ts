import mongoose, { Schema, type Model } from 'mongoose';

export type SeasonRecord = {
  title: string;
  description: string | null;
  start_date: Date | null;
  end_date: Date | null;
  is_active: boolean;
};

const SeasonSchema = new Schema<SeasonRecord>(
  {
    title: { type: String, required: true },
    description: { type: String, default: null },
    start_date: { type: Date, default: null },
    end_date: { type: Date, default: null },
    is_active: { type: Boolean, default: true, index: true }
  },
  { collection: 'season', timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' } }
);

const SeasonModel =
  (mongoose.models.Season as Model<SeasonRecord>) || mongoose.model<SeasonRecord>('Season', SeasonSchema);

export default SeasonModel;
