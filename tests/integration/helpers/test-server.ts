import type { FastifyInstance } from 'fastify';
import { pino } from 'pino';
import {
  createDefaultRegistry,
  registerRuleVersionsFromDirectory,
  setRootLogger,
  InMemoryEligibilitySource,
  InMemorySnapshotStore,
  SnapshotPublisher,
} from '@eligibility-ledger/core';
import type {
  InMemorySourceData,
  PublisherConfig,
  RuleVersionRegistry,
} from '@eligibility-ledger/core';
import { createServer } from '../../../packages/api/src/server.js';
import { RULES_DIR } from './fixtures.js';

export interface TestServer {
  app: FastifyInstance;
  source: InMemoryEligibilitySource;
  store: InMemorySnapshotStore;
  registry: RuleVersionRegistry;
  publisher: SnapshotPublisher;
}

export async function createTestServer(
  data: InMemorySourceData,
  config: Partial<PublisherConfig> = {},
): Promise<TestServer> {
  const logger = pino({ level: 'silent' });
  setRootLogger(logger);

  const source = new InMemoryEligibilitySource(data);
  const store = new InMemorySnapshotStore();
  const registry = createDefaultRegistry();
  await registerRuleVersionsFromDirectory(registry, RULES_DIR);

  const publisher = new SnapshotPublisher({ source, store, registry, config, logger });
  const app = createServer({ publisher, store, registry, logLevel: 'silent' });

  return { app, source, store, registry, publisher };
}
