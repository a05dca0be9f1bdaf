import { NotFoundError } from '@/lib/errors';
import type { Filter } from '@/lib/repository';
import type { EpisodeQuery } from '@/lib/schemas';
import type { Store } from '@/lib/store';
import type { Episode, EpisodeInput } from '@/lib/types';

/** `unsorted` wins over `season_id`; neither means every episode. */
export function resolveEpisodeFilter(query: EpisodeQuery): Filter<Episode> {
  if (query.unsorted) return { season_id: null };
  if (query.season_id !== undefined) return { season_id: query.season_id };
  return {};
}

export async function listEpisodes(store: Store, query: EpisodeQuery = {}) {
  return store.episodes.findMany(resolveEpisodeFilter(query));
}

export async function createEpisode(store: Store, input: EpisodeInput): Promise<Episode> {
  const id = await store.episodes.insert(input);
  const created = await store.episodes.findById(id);
  if (!created) {
    throw new Error(`Episode ${id} could not be read back after insert.`);
  }
  return created;
}

// season_id is a weak reference; it is stored as given without checking the season exists.
export async function updateEpisode(store: Store, id: string, input: EpisodeInput): Promise<Episode> {
  const updated = await store.episodes.findOneAndUpdate(id, input);
  if (!updated) {
    throw new NotFoundError('episode');
  }
  return updated;
}

export async function deleteEpisode(store: Store, id: string) {
  const deleted = await store.episodes.deleteOne(id);
  if (!deleted) {
    throw new NotFoundError('episode');
  }
  return deleted;
}
