import { createDb } from '../db/knex.js';
import { migrationSource } from '../db/migrations/index.js';
import { createLogger } from '../logger.js';

const log = createLogger('rollback');
const db = createDb();

try {
  const [batch, files]: [number, string[]] = await db.migrate.rollback({ migrationSource }, true);
  log.info({ batch, files }, 'rollback done');
} catch (err) {
  log.error({ err }, 'rollback failed');
  process.exitCode = 1;
} finally {
  await db.destroy();
}
