import mongoose from 'mongoose';
import { getDatabaseConfig } from '@/lib/config';
import type { DatabaseProbe } from '@/lib/diagnostics';
import { StoreUnavailableError } from '@/lib/errors';

type MongooseCache = {
  conn: typeof mongoose | null;
  promise: Promise<typeof mongoose> | null;
};

declare global {
  // eslint-disable-next-line no-var
  var mongooseCache: MongooseCache | undefined;
}

const cached: MongooseCache = globalThis.mongooseCache ?? { conn: null, promise: null };
globalThis.mongooseCache = cached;

export function isDatabaseConfigured() {
  return Boolean(getDatabaseConfig().url);
}

export async function connectToDatabase() {
  if (cached.conn) return cached.conn;

  const { url, name, timeoutMs } = getDatabaseConfig();
  if (!url) {
    throw new StoreUnavailableError('Missing DATABASE_URL in environment variables');
  }

  if (!cached.promise) {
    cached.promise = mongoose.connect(url, {
      bufferCommands: false,
      serverSelectionTimeoutMS: timeoutMs,
      ...(name ? { dbName: name } : {})
    });
  }

  let conn: typeof mongoose;
  try {
    conn = await cached.promise;
  } catch (error) {
    cached.promise = null;
    console.error('[db] connection failed', error);
    throw error;
  }

  if (!cached.conn) {
    console.log(`[db] connected to "${conn.connection.name}"`);
  }
  cached.conn = conn;
  return conn;
}

export async function listCollectionNames() {
  const { connection } = await connectToDatabase();
  const db = connection.db;
  if (!db) {
    throw new StoreUnavailableError('Database handle is not ready.');
  }

  const collections = await db.listCollections({}, { nameOnly: true }).toArray();
  return collections.map((collection) => collection.name).sort((a, b) => a.localeCompare(b));
}

export const mongoDatabaseProbe: DatabaseProbe = {
  isConfigured: isDatabaseConfigured,
  async connect() {
    const conn = await connectToDatabase();
    return conn.connection.name;
  },
  listCollections: listCollectionNames
};
