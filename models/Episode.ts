import mongoose, { Schema, type Model } from 'mongoose';

export type EpisodeRecord = {
  title: string;
  date: Date;
  rating: number;
  plot_points: string[];
  season_id: string | null;
};

const EpisodeSchema = new Schema<EpisodeRecord>(
  {
    // Empty titles are accepted, so no `required` here.
    title: { type: String, default: '' },
    date: { type: Date, required: true },
    rating: { type: Number, required: true, min: 1, max: 10 },
    plot_points: { type: [String], default: [] },
    season_id: { type: String, default: null, index: true }
  },
  { collection: 'episode', timestamps: { createdAt: 'created_at', updatedAt: 'updated_at' } }
);

const EpisodeModel =
  (mongoose.models.Episode as Model<EpisodeRecord>) || mongoose.model<EpisodeRecord>('Episode', EpisodeSchema);

export default EpisodeModel;
