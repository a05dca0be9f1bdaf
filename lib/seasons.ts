import { NotFoundError } from '@/lib/errors';
import type { Store } from '@/lib/store';
import type { Season, SeasonInput } from '@/lib/types';

export async function listSeasons(store: Store) {
  return store.seasons.findMany();
}

// Deactivate-then-write is two separate operations. A concurrent write landing between
// them can leave two active seasons.
async function deactivateAllSeasons(store: Store) {
  return store.seasons.updateMany({ is_active: true }, { is_active: false });
}

export async function createSeason(store: Store, input: SeasonInput): Promise<Season> {
  if (input.is_active) {
    await deactivateAllSeasons(store);
  }

  const id = await store.seasons.insert(input);
  const created = await store.seasons.findById(id);
  if (!created) {
    throw new Error(`Season ${id} could not be read back after insert.`);
  }
  return created;
}

export async function updateSeason(store: Store, id: string, input: SeasonInput): Promise<Season> {
  const existing = await store.seasons.findById(id);
  if (!existing) {
    throw new NotFoundError('season');
  }

  if (input.is_active) {
    await deactivateAllSeasons(store);
  }

  const updated = await store.seasons.findOneAndUpdate(id, input);
  if (!updated) {
    throw new NotFoundError('season');
  }
  return updated;
}

/** Deletes the season and moves its episodes to unsorted. Resolves to the number of episodes moved. */
export async function deleteSeason(store: Store, id: string): Promise<number> {
  const deleted = await store.seasons.deleteOne(id);
  if (!deleted) {
    throw new NotFoundError('season');
  }

  let orphaned = await store.episodes.updateMany({ season_id: deleted.id }, { season_id: null });
  if (id !== deleted.id) {
    orphaned += await store.episodes.updateMany({ season_id: id }, { season_id: null });
  }

  return orphaned;
}
