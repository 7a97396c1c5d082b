import knex, { type Knex } from 'knex';
import { env } from '../config.js';
import { migrationSource } from './migrations/index.js';

/**
 * Postgres in production. Migrations come from an in-code source so the
 * same list runs under tsx, the compiled build and the tests.
 */
export function createDb(connection: string = env.DATABASE_URL): Knex {
  return knex({
    client: 'pg',
    connection,
    pool: { min: 0, max: 10 },
    migrations: {
      tableName: 'knex_migrations',
      migrationSource,
    },
  });
}

export async function migrateLatest(db: Knex): Promise<string[]> {
  const [, files] = await db.migrate.latest({ migrationSource });
  return files;
}
