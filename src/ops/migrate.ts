import { createDb, migrateLatest } from '../db/knex.js';
import { createLogger } from '../logger.js';

const log = createLogger('migrate');
const db = createDb();

try {
  const files = await migrateLatest(db);
  log.info({ files }, files.length ? 'migrations applied' : 'already up to date');
} catch (err) {
  log.error({ err }, 'migration failed');
  process.exitCode = 1;
} finally {
  await db.destroy();
}
