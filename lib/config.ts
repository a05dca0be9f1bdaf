const DEFAULT_TIMEOUT_MS = 5000;

export type DatabaseConfig = {
  url: string;
  name: string;
  timeoutMs: number;
};

export function getDatabaseConfig(): DatabaseConfig {
  const timeoutMs = Number.parseInt(process.env.DATABASE_TIMEOUT_MS || '', 10);

  return {
    url: (process.env.DATABASE_URL || process.env.MONGODB_URI || '').trim(),
    name: (process.env.DATABASE_NAME || '').trim(),
    timeoutMs: Number.isFinite(timeoutMs) && timeoutMs > 0 ? timeoutMs : DEFAULT_TIMEOUT_MS
  };
}
