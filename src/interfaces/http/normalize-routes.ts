import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { normalizeRequestSchema, processLines, processRecords, stringifyJson } from '../../application/index.js';
import type { InventoryStrategy, TimestampClock } from '../../domain/index.js';

export interface NormalizeRoutesOptions {
  inventory: InventoryStrategy;
  clock: TimestampClock;
}

/**
 * Registers the normalization routes.
 *
 * POST /api/v1/normalize: normalize a batch and return both partitions
 * GET  /api/v1/health: liveness check
 *
 * The whole batch is answered in one response; nothing is persisted.
 */
async function normalizeRoutes(fastify: FastifyInstance, opts: NormalizeRoutesOptions): Promise<void> {

  // Payloads parsed from `lines` may carry bigint values.
  fastify.setReplySerializer((payload) => stringifyJson(payload));

  /**
   * Batch normalization.
   *
   * Body is `{ lines: string[] }` or `{ records: unknown[] }`.
   * Rejected lines are part of a 200 response; only a malformed body is a 400.
   */
  fastify.post(
    '/api/v1/normalize',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = normalizeRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const options = { inventory: opts.inventory, clock: opts.clock, log: request.log };
      const result = 'lines' in parsed.data
        ? processLines(parsed.data.lines, options)
        : processRecords(parsed.data.records, options);

      return reply.status(200).send({
        valid: result.valid,
        invalid: result.invalid,
        summary: result.summary,
      });
    },
  );

  fastify.get('/api/v1/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });
}

export default fp(normalizeRoutes, {
  name: 'normalize-routes',
  fastify: '5.x',
});
