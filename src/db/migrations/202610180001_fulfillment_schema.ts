import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('customers', (t) => {
    t.string('ref', 64).primary();
    t.string('full_name', 128);
    t.string('phone', 32);
    t.string('email', 128);
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
  });

  await knex.schema.createTable('orders', (t) => {
    t.increments('id').primary();
    t.string('owner_ref', 64).notNullable().index();
    t.integer('total_minor').notNullable();
    t.string('fulfillment', 16).notNullable();     // full | prepay
    t.string('status', 32).notNullable();          // see ORDER_STATUSES
    t.string('paid_kind', 16);                     // full | prepay | remainder
    t.string('tracking_id', 64);
    t.json('extension').notNullable();
    t.integer('version').notNullable().defaultTo(0);
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
    t.timestamp('status_changed_at', { useTz: true }).notNullable();
    t.index(['status', 'status_changed_at']);
  });

  await knex.schema.createTable('payment_attempts', (t) => {
    t.string('gateway_id', 128).primary();
    t.integer('order_id').notNullable().references('orders.id');
    t.string('kind', 16).notNullable();            // full | prepay | remainder
    t.integer('amount_minor').notNullable();
    t.string('status', 16).notNullable();          // pending | succeeded | failed
    t.text('confirmation_url');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
    t.index(['order_id']);
  });

  await knex.schema.createTable('shipment_requests', (t) => {
    t.integer('order_id').primary().references('orders.id');
    t.string('carrier_id', 64);
    t.string('state', 16).notNullable();           // requested | accepted | failed
    t.string('last_status_code', 64);
    t.string('last_status_description', 255);
    t.boolean('terminal').notNullable().defaultTo(false);
    t.json('raw');
    t.timestamp('created_at', { useTz: true }).notNullable();
    t.timestamp('updated_at', { useTz: true }).notNullable();
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('shipment_requests');
  await knex.schema.dropTableIfExists('payment_attempts');
  await knex.schema.dropTableIfExists('orders');
  await knex.schema.dropTableIfExists('customers');
}
