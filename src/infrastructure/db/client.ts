import { neon } from '@neondatabase/serverless';
import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import * as schema from './schema.js';

export type Database = NeonHttpDatabase<typeof schema>;

export function createDatabase(connectionUrl: string): Database {
  const sql = neon(connectionUrl);
  return drizzle(sql, { schema });
}
