import { describe, expect, it } from 'vitest';
import { ValidationError } from '@/lib/errors';
import { describeResourceSchemas, parseEpisodeInput, parseEpisodeQuery, parseSeasonInput } from '@/lib/schemas';

function issuesOf(run: () => unknown) {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.detail.map((issue) => issue.field);
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('parseSeasonInput', () => {
  it('fills defaults for optional fields', () => {
    expect(parseSeasonInput({ title: 'Year One' })).toEqual({
      title: 'Year One',
      description: null,
      start_date: null,
      end_date: null,
      is_active: true
    });
  });

  it('drops unknown keys', () => {
    expect(parseSeasonInput({ title: 'Year One', is_active: false, id: 'client-made' })).toEqual({
      title: 'Year One',
      description: null,
      start_date: null,
      end_date: null,
      is_active: false
    });
  });

  it('does not enforce an order between start and end dates', () => {
    const input = parseSeasonInput({ title: 'Backwards', start_date: '2024-06-01', end_date: '2024-01-01' });
    expect(input.start_date).toBe('2024-06-01');
    expect(input.end_date).toBe('2024-01-01');
  });

  it('requires a non-empty title', () => {
    expect(issuesOf(() => parseSeasonInput({}))).toEqual(['title']);
    expect(issuesOf(() => parseSeasonInput({ title: '' }))).toEqual(['title']);
  });

  it('rejects malformed dates and non-boolean is_active', () => {
    expect(issuesOf(() => parseSeasonInput({ title: 'A', start_date: '2024-13-01', is_active: 'yes' }))).toEqual([
      'start_date',
      'is_active'
    ]);
  });

  it('reports a non-object body on the body root', () => {
    expect(issuesOf(() => parseSeasonInput(undefined))).toEqual(['body']);
  });
});

describe('parseEpisodeInput', () => {
  const base = { title: 'Day 1', date: '2024-01-01' };

  it('accepts the rating bounds', () => {
    expect(parseEpisodeInput({ ...base, rating: 1 }).rating).toBe(1);
    expect(parseEpisodeInput({ ...base, rating: 10 }).rating).toBe(10);
  });

  it('rejects ratings outside 1..10 or non-integers', () => {
    expect(issuesOf(() => parseEpisodeInput({ ...base, rating: 0 }))).toEqual(['rating']);
    expect(issuesOf(() => parseEpisodeInput({ ...base, rating: 11 }))).toEqual(['rating']);
    expect(issuesOf(() => parseEpisodeInput({ ...base, rating: 7.5 }))).toEqual(['rating']);
  });

  it('defaults plot_points and season_id', () => {
    expect(parseEpisodeInput({ ...base, rating: 7 })).toEqual({
      title: 'Day 1',
      date: '2024-01-01',
      rating: 7,
      plot_points: [],
      season_id: null
    });
  });

  it('requires title, date and rating', () => {
    expect(issuesOf(() => parseEpisodeInput({}))).toEqual(['title', 'date', 'rating']);
  });

  it('reports nested plot point issues with their index', () => {
    expect(issuesOf(() => parseEpisodeInput({ ...base, rating: 5, plot_points: ['ok', 3] }))).toEqual([
      'plot_points.1'
    ]);
  });
});

describe('parseEpisodeQuery', () => {
  it('reads season_id and unsorted', () => {
    expect(parseEpisodeQuery(new URLSearchParams('season_id=abc&unsorted=true'))).toEqual({
      season_id: 'abc',
      unsorted: true
    });
    expect(parseEpisodeQuery(new URLSearchParams('unsorted=0'))).toEqual({ unsorted: false });
    expect(parseEpisodeQuery(new URLSearchParams(''))).toEqual({});
  });

  it('rejects an unrecognised unsorted value', () => {
    expect(issuesOf(() => parseEpisodeQuery(new URLSearchParams('unsorted=maybe')))).toEqual(['unsorted']);
  });
});

describe('describeResourceSchemas', () => {
  it('lists only fields without defaults as required', () => {
    const { season, episode } = describeResourceSchemas();

    expect(season.title).toBe('Season');
    expect(season.required).toEqual(['title']);
    expect(Object.keys(season.properties ?? {})).toEqual([
      'title',
      'description',
      'start_date',
      'end_date',
      'is_active'
    ]);

    expect(episode.title).toBe('Episode');
    expect(episode.required).toEqual(['title', 'date', 'rating']);
  });

  it('publishes the rating bounds', () => {
    const { episode } = describeResourceSchemas();

    expect(episode.properties?.rating).toMatchObject({ type: 'integer', minimum: 1, maximum: 10 });
  });
});
