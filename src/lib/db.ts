import { sql } from 'drizzle-orm';
import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from '../schema';
import { getDatabaseUrl } from './env';

export type Database = PostgresJsDatabase<typeof schema>;

let client: postgres.Sql | null = null;
let database: Database | null = null;
let connectedUrl: string | null = null;

/**
 * Returns the shared Drizzle instance, reconnecting when a different URL is requested.
 */
export async function getDatabase(databaseUrl: string = getDatabaseUrl()): Promise<Database> {
  if (database && connectedUrl === databaseUrl) {
    return database;
  }

  if (client) {
    await client.end({ timeout: 5 });
  }

  client = postgres(databaseUrl, { max: 10, onnotice: () => undefined });
  database = drizzle(client, { schema });
  connectedUrl = databaseUrl;
  return database;
}

export async function testDatabaseConnection(): Promise<boolean> {
  try {
    const db = await getDatabase();
    await db.execute(sql`select 1`);
    return true;
  } catch (error) {
    console.error('[db] Connection check failed:', error);
    return false;
  }
}

export async function closeDatabase(): Promise<void> {
  if (!client) {
    return;
  }

  await client.end({ timeout: 5 });
  client = null;
  database = null;
  connectedUrl = null;
}
