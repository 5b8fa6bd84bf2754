import type { FastifyInstance } from 'fastify';
import type { PublishRequest, PublishResult, SnapshotPublisher } from '@eligibility-ledger/core';

interface PublishBody {
  as_of_ts?: unknown;
  rule_version?: unknown;
  dry_run?: unknown;
  scope_package_ids?: unknown;
  skip_if_unchanged?: unknown;
}

type ParsedBody = { ok: true; request: PublishRequest } | { ok: false; message: string };

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function parsePublishBody(body: PublishBody | undefined, dryRun: boolean): ParsedBody {
  if (!body || typeof body.as_of_ts !== 'string') {
    return { ok: false, message: 'as_of_ts is required' };
  }
  const asOf = new Date(body.as_of_ts);
  if (Number.isNaN(asOf.getTime())) {
    return { ok: false, message: `as_of_ts is not a valid timestamp: ${body.as_of_ts}` };
  }
  if (typeof body.rule_version !== 'string' || body.rule_version === '') {
    return { ok: false, message: 'rule_version is required' };
  }
  if (body.scope_package_ids !== undefined && !isStringArray(body.scope_package_ids)) {
    return { ok: false, message: 'scope_package_ids must be an array of strings' };
  }

  return {
    ok: true,
    request: {
      asOf,
      ruleVersion: body.rule_version,
      dryRun: dryRun || body.dry_run === true,
      scopePackageIds: body.scope_package_ids,
      skipIfUnchanged: body.skip_if_unchanged === true,
    },
  };
}

function toResponse(result: PublishResult) {
  return {
    run_id: result.run_id,
    snapshot_id: result.snapshot_id,
    status: result.status,
    as_of_ts: result.as_of_ts.toISOString(),
    rule_version: result.rule_version,
    content_hash: result.content_hash,
    line_count: result.line_count,
    pointer_advanced: result.pointer_advanced,
    short_circuited: result.short_circuited,
    summary_status: result.summary_status,
    summaries: result.summaries,
    issues: result.issues,
    lines: result.lines,
  };
}

export function registerPublishRoutes(app: FastifyInstance, publisher: SnapshotPublisher): void {
  // POST /publish: run one publish cycle
  app.post<{ Body: PublishBody }>('/publish', async (request, reply) => {
    const parsed = parsePublishBody(request.body, false);
    if (!parsed.ok) {
      return reply.status(400).send({ error: 'Validation Error', message: parsed.message });
    }

    const result = await publisher.publish(parsed.request);
    return reply.status(result.status === 'PUBLISHED' ? 201 : 200).send(toResponse(result));
  });

  // POST /publish/dry-run: compute and validate without writing
  app.post<{ Body: PublishBody }>('/publish/dry-run', async (request, reply) => {
    const parsed = parsePublishBody(request.body, true);
    if (!parsed.ok) {
      return reply.status(400).send({ error: 'Validation Error', message: parsed.message });
    }

    const result = await publisher.publish(parsed.request);
    return reply.send(toResponse(result));
  });
}
