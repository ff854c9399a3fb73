import { drizzle } from 'drizzle-orm/mysql2';
import { createPool } from 'mysql2/promise';

export function createDb(databaseUrl: string) {
  const pool = createPool({ uri: databaseUrl });
  const db = drizzle(pool);

  return {
    db,
    close: () => pool.end(),
  };
}

export type Database = ReturnType<typeof createDb>['db'];
