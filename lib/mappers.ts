import { fromCalendarDate, toCalendarDate } from '@/lib/dates';
import { toPublicId } from '@/lib/ids';
import type { DocumentMapper } from '@/lib/repository';
import type { Episode, EpisodeInput, Season, SeasonInput } from '@/lib/types';
import type { EpisodeRecord } from '@/models/Episode';
import type { SeasonRecord } from '@/models/Season';

function seasonFields(input: Partial<SeasonInput>): Partial<SeasonRecord> {
  const { start_date, end_date, ...rest } = input;
  return {
    ...rest,
    ...(start_date !== undefined ? { start_date: fromCalendarDate(start_date) } : {}),
    ...(end_date !== undefined ? { end_date: fromCalendarDate(end_date) } : {})
  };
}

function episodeFields(input: Partial<EpisodeInput>): Partial<EpisodeRecord> {
  const { date, ...rest } = input;
  return {
    ...rest,
    ...(date !== undefined ? { date: fromCalendarDate(date) } : {})
  };
}

export const seasonMapper: DocumentMapper<Season, SeasonRecord> = {
  toPublic(document) {
    return {
      id: toPublicId(document._id),
      title: document.title,
      description: document.description ?? null,
      start_date: toCalendarDate(document.start_date),
      end_date: toCalendarDate(document.end_date),
      is_active: Boolean(document.is_active)
    };
  },
  toRecord(input) {
    return {
      ...input,
      start_date: fromCalendarDate(input.start_date),
      end_date: fromCalendarDate(input.end_date)
    };
  },
  toFilter: seasonFields,
  toUpdate(changes) {
    return { $set: seasonFields(changes) };
  }
};

export const episodeMapper: DocumentMapper<Episode, EpisodeRecord> = {
  toPublic(document) {
    return {
      id: toPublicId(document._id),
      title: document.title,
      date: toCalendarDate(document.date),
      rating: document.rating,
      plot_points: [...(document.plot_points || [])],
      season_id: document.season_id ?? null
    };
  },
  toRecord(input) {
    return { ...input, date: fromCalendarDate(input.date) };
  },
  toFilter: episodeFields,
  toUpdate(changes) {
    return { $set: episodeFields(changes) };
  }
};
