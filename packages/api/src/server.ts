import Fastify from 'fastify';
import type { FastifyError, FastifyInstance } from 'fastify';
import {
  generateId,
  ValidationError,
  EntityNotFoundError,
  GrainViolationError,
  RuleVersionUnknownError,
  RuleVersionConflictError,
  ConcurrentPublishConflictError,
  PublishTimeoutError,
} from '@eligibility-ledger/core';
import type {
  RuleVersionRegistry,
  SnapshotPublisher,
  SnapshotStore,
} from '@eligibility-ledger/core';
import { registerPublishRoutes } from './routes/publish.route.js';
import { registerSnapshotRoutes } from './routes/snapshots.route.js';
import { registerRuleVersionRoutes } from './routes/rule-versions.route.js';
import { registerHealthRoutes } from './routes/health.route.js';

export interface ServerDeps {
  publisher: SnapshotPublisher;
  store: SnapshotStore;
  registry: RuleVersionRegistry;
  logLevel?: string;
}

export function createServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({
    logger: { level: deps.logLevel ?? 'info' },
    genReqId: () => generateId(),
  });

  // Add correlation ID to every request
  app.addHook('onRequest', async (request) => {
    const header = request.headers['x-correlation-id'];
    const correlationId = typeof header === 'string' && header !== '' ? header : generateId();
    request.headers['x-correlation-id'] = correlationId;
    request.log = request.log.child({ correlation_id: correlationId });
  });

  registerPublishRoutes(app, deps.publisher);
  registerSnapshotRoutes(app, deps.publisher);
  registerRuleVersionRoutes(app, deps.registry);
  registerHealthRoutes(app, deps.store);

  // Global error handler
  app.setErrorHandler((error: FastifyError | ValidationError, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: error.message,
        field: error.field,
      });
    }

    if (error instanceof RuleVersionUnknownError) {
      return reply.status(400).send({
        error: 'Unknown Rule Version',
        message: error.message,
        rule_version: error.ruleVersion,
      });
    }

    if (error instanceof GrainViolationError) {
      return reply.status(422).send({
        error: 'Grain Violation',
        message: error.message,
        kind: error.kind,
        key: error.key,
      });
    }

    if (error instanceof ConcurrentPublishConflictError) {
      return reply.status(409).send({
        error: 'Concurrent Publish Conflict',
        message: error.message,
        lease_key: error.leaseKey,
        held_by: error.heldBy,
      });
    }

    if (error instanceof RuleVersionConflictError) {
      return reply.status(409).send({
        error: 'Rule Version Conflict',
        message: error.message,
        rule_version: error.ruleVersion,
      });
    }

    if (error instanceof EntityNotFoundError) {
      return reply.status(404).send({
        error: 'Not Found',
        message: error.message,
        entity_type: error.entityType,
        entity_id: error.entityId,
      });
    }

    if (error instanceof PublishTimeoutError) {
      return reply.status(504).send({
        error: 'Publish Timeout',
        message: error.message,
        timeout_ms: error.timeoutMs,
      });
    }

    // Fastify's own client errors (malformed JSON, unsupported media type)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: 'Bad Request',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
