import type { FastifyInstance } from 'fastify';
import type { SnapshotPublisher } from '@eligibility-ledger/core';

interface LinesQuery {
  scope_package_id?: string;
  ready?: string;
}

interface RunsQuery {
  limit?: string;
}

export function registerSnapshotRoutes(app: FastifyInstance, publisher: SnapshotPublisher): void {
  // GET /snapshots/current: snapshot behind the current pointer
  app.get('/snapshots/current', async (_request, reply) => {
    const current = await publisher.getCurrent();
    if (!current) {
      return reply.status(404).send({
        error: 'Not Found',
        message: 'No snapshot has been published yet',
      });
    }
    return reply.send({
      pointer_version: current.pointer.version,
      pointer_updated_at: current.pointer.updated_at,
      ...current.snapshot,
    });
  });

  app.get('/snapshots', async (_request, reply) => {
    return reply.send(await publisher.listSnapshots());
  });

  app.get<{ Params: { id: string } }>('/snapshots/:id', async (request, reply) => {
    return reply.send(await publisher.getSnapshot(request.params.id));
  });

  // GET /snapshots/:id/lines?scope_package_id=&ready=true|false
  app.get<{ Params: { id: string }; Querystring: LinesQuery }>(
    '/snapshots/:id/lines',
    async (request, reply) => {
      const { scope_package_id: scopePackageId, ready } = request.query;
      if (ready !== undefined && ready !== 'true' && ready !== 'false') {
        return reply.status(400).send({
          error: 'Validation Error',
          message: 'ready must be true or false',
        });
      }

      const lines = await publisher.getLines(request.params.id);
      return reply.send(
        lines.filter(
          (line) =>
            (scopePackageId === undefined || line.scope_package_id === scopePackageId) &&
            (ready === undefined || line.ready_to_invoice_flg === (ready === 'true')),
        ),
      );
    },
  );

  app.get<{ Params: { id: string } }>('/snapshots/:id/summaries', async (request, reply) => {
    return reply.send(await publisher.getSummaries(request.params.id));
  });

  // POST /snapshots/:id/summaries/regenerate: retry a pending summary step
  app.post<{ Params: { id: string } }>(
    '/snapshots/:id/summaries/regenerate',
    async (request, reply) => {
      const summaries = await publisher.regenerateSummaries(request.params.id);
      return reply.send({ snapshot_id: request.params.id, summaries });
    },
  );

  app.get<{ Querystring: RunsQuery }>('/publish-runs', async (request, reply) => {
    const limit = request.query.limit === undefined ? 50 : Number(request.query.limit);
    if (!Number.isInteger(limit) || limit <= 0) {
      return reply.status(400).send({
        error: 'Validation Error',
        message: 'limit must be a positive integer',
      });
    }
    return reply.send(await publisher.listRuns(limit));
  });
}
