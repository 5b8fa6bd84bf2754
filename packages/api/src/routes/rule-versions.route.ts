import type { FastifyInstance } from 'fastify';
import type { RuleVersionRegistry } from '@eligibility-ledger/core';

export function registerRuleVersionRoutes(
  app: FastifyInstance,
  registry: RuleVersionRegistry,
): void {
  app.get('/rule-versions', async (_request, reply) => {
    return reply.send(
      registry.list().map((ruleVersion) => ({
        version: ruleVersion.version,
        description: ruleVersion.description,
        rule_count: ruleVersion.rules.length,
        blocker_codes: [...new Set(ruleVersion.rules.map((rule) => rule.blocker_code))].sort(),
      })),
    );
  });

  app.get<{ Params: { version: string } }>('/rule-versions/:version', async (request, reply) => {
    if (!registry.has(request.params.version)) {
      return reply.status(404).send({
        error: 'Not Found',
        message: `Rule version "${request.params.version}" is not registered`,
      });
    }
    return reply.send(registry.get(request.params.version));
  });
}
