import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import {
  createPool,
  createDefaultRegistry,
  getLogger,
  loadConfig,
  registerRuleVersionsFromDirectory,
  runMigrations,
  setRootLogger,
  createLogger,
  PgEligibilitySource,
  PgSnapshotStore,
  SnapshotPublisher,
} from '@eligibility-ledger/core';
import { createServer } from './server.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

async function main() {
  const config = loadConfig();
  setRootLogger(createLogger(config.logLevel));
  const logger = getLogger('api');

  const pool = createPool(config.database);

  // Run migrations
  const migrationsDir = join(__dirname, '../../../migrations');
  const applied = await runMigrations(pool, migrationsDir);
  logger.info({ applied }, 'migrations applied');

  // Rule versions: v1 is built in, later versions ship as files
  const registry = createDefaultRegistry();
  const rulesDir = config.rulesDir ?? join(__dirname, '../../../rules');
  const registered = await registerRuleVersionsFromDirectory(registry, rulesDir);
  logger.info({ rules_dir: rulesDir, registered }, 'rule versions registered');

  const store = new PgSnapshotStore(pool);
  const publisher = new SnapshotPublisher({
    source: new PgEligibilitySource(pool),
    store,
    registry,
    config: config.publisher,
  });

  const server = createServer({ publisher, store, registry, logLevel: config.logLevel });

  await server.listen({ port: config.port, host: '0.0.0.0' });
  logger.info({ port: config.port }, 'eligibility API listening');

  // Graceful shutdown
  const shutdown = async () => {
    await server.close();
    await pool.end();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, 'shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
  getLogger('api').fatal({ err }, 'failed to start server');
  process.exit(1);
});
