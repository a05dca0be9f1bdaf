export type Season = {
  id: string;
  title: string;
  description: string | null;
  start_date: string | null;
  end_date: string | null;
  is_active: boolean;
};

export type Episode = {
  id: string;
  title: string;
  date: string;
  rating: number;
  plot_points: string[];
  season_id: string | null;
};

export type Resource = {
  id: string;
};

export type ResourceInput<T extends Resource> = Omit<T, 'id'>;

export type SeasonInput = ResourceInput<Season>;

export type EpisodeInput = ResourceInput<Episode>;
