import { z } from 'zod';
import { ValidationError, type FieldIssue } from '@/lib/errors';
import type { EpisodeInput, SeasonInput } from '@/lib/types';

export const seasonInputSchema = z
  .object({
    title: z.string().min(1, 'title must not be empty').describe('Season title'),
    description: z.string().nullable().default(null).describe('Short description for the season'),
    start_date: z.iso.date().nullable().default(null).describe('When this season starts'),
    end_date: z.iso.date().nullable().default(null).describe('When this season ends'),
    is_active: z.boolean().default(true).describe('Whether this is the active season')
  })
  .meta({ title: 'Season' });

export const episodeInputSchema = z
  .object({
    title: z.string().describe('Episode title'),
    date: z.iso.date().describe('Date of the episode'),
    rating: z.number().int().min(1).max(10).describe('Day rating 1-10'),
    plot_points: z.array(z.string()).default([]).describe('Bulleted list of key moments'),
    season_id: z
      .string()
      .nullable()
      .default(null)
      .describe('ID of the season this episode belongs to, null when unsorted')
  })
  .meta({ title: 'Episode' });

const episodeQuerySchema = z.object({
  season_id: z.string().optional(),
  unsorted: z.stringbool().optional()
});

export type EpisodeQuery = z.infer<typeof episodeQuerySchema>;

function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.map(String).join('.') : 'body',
    message: issue.message
  }));
}

function parseWith<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(toFieldIssues(result.error));
  }
  return result.data;
}

export function parseSeasonInput(body: unknown): SeasonInput {
  return parseWith(seasonInputSchema, body);
}

export function parseEpisodeInput(body: unknown): EpisodeInput {
  return parseWith(episodeInputSchema, body);
}

export function parseEpisodeQuery(searchParams: URLSearchParams): EpisodeQuery {
  return parseWith(episodeQuerySchema, {
    season_id: searchParams.get('season_id') ?? undefined,
    unsorted: searchParams.get('unsorted') ?? undefined
  });
}

/** JSON Schema for each resource as a client submits it. */
export function describeResourceSchemas() {
  return {
    season: z.toJSONSchema(seasonInputSchema, { io: 'input' }),
    episode: z.toJSONSchema(episodeInputSchema, { io: 'input' })
  };
}
