// src/server.ts
import { createApp } from './app.js';
import { carrierFromEnv } from './carrier/restCarrier.js';
import { assertCriticalEnv, env } from './config.js';
import { createDb, migrateLatest } from './db/knex.js';
import { Engine } from './engine.js';
import { createLogger } from './logger.js';
import { gatewayFromEnv } from './psp/restGateway.js';
import { whatsAppFromEnv } from './whatsapp.js';

const log = createLogger('server');

async function main(): Promise<void> {
  assertCriticalEnv([
    'DATABASE_URL',
    'ADMIN_TOKEN',
    'OPERATOR_RECIPIENTS',
    'WHATSAPP_TOKEN',
    'PHONE_NUMBER_ID',
    'PSP_BASE_URL',
    'PSP_SHOP_ID',
    'PSP_SECRET_KEY',
    'PSP_WEBHOOK_SECRET',
    'CARRIER_BASE_URL',
    'CARRIER_CLIENT_ID',
    'CARRIER_CLIENT_SECRET',
  ]);

  const db = createDb();
  const applied = await migrateLatest(db);
  if (applied.length) log.info({ applied }, 'migrations applied');

  const engine = new Engine({
    db,
    gateway: gatewayFromEnv(),
    carrier: carrierFromEnv(),
    transport: whatsAppFromEnv(),
    settings: env,
  });
  const app = createApp(engine, {
    adminToken: env.ADMIN_TOKEN,
    webhookSecret: env.PSP_WEBHOOK_SECRET,
    webhookAllowedIps: env.PSP_WEBHOOK_ALLOWED_IPS,
    trustProxy: env.TRUST_PROXY,
  });

  engine.start();
  const server = app.listen(env.PORT, () => {
    log.info({ port: env.PORT }, 'listening');
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'shutting down');
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await engine.stop();
    await db.destroy();
    log.info('bye');
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          log.fatal({ err }, 'shutdown failed');
          process.exit(1);
        }
      );
    });
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'boot failed');
  process.exit(1);
});
