import { connectToDatabase } from '@/lib/db';
import { episodeMapper, seasonMapper } from '@/lib/mappers';
import { MongooseRepository, type Repository } from '@/lib/repository';
import type { Episode, Season } from '@/lib/types';
import EpisodeModel from '@/models/Episode';
import SeasonModel from '@/models/Season';

export type Store = {
  seasons: Repository<Season>;
  episodes: Repository<Episode>;
};

let store: Store | null = null;

export async function getStore(): Promise<Store> {
  await connectToDatabase();

  if (!store) {
    store = {
      seasons: new MongooseRepository('season', SeasonModel, seasonMapper),
      episodes: new MongooseRepository('episode', EpisodeModel, episodeMapper)
    };
  }
  return store;
}
