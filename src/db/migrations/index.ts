import type { Knex } from 'knex';
import * as fulfillmentSchema from './202610180001_fulfillment_schema.js';
import * as notificationOutbox from './202610180002_notification_outbox.js';

type NamedMigration = { name: string; migration: Knex.Migration };

const MIGRATIONS: NamedMigration[] = [
  { name: '202610180001_fulfillment_schema', migration: fulfillmentSchema },
  { name: '202610180002_notification_outbox', migration: notificationOutbox },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  async getMigrations() {
    return MIGRATIONS;
  },
  getMigrationName(m) {
    return m.name;
  },
  async getMigration(m) {
    return m.migration;
  },
};
