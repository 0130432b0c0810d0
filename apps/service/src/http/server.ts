import { IncompleteAssessmentError } from '@siteline/core';
import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { SiteComparisonService } from '../sites/service.js';

const SiteRequestSchema = z
  .object({
    name: z.string().trim().min(1, 'name must not be empty'),
    environmentalReport: z.string().optional()
  })
  .strict();

const AssessBodySchema = SiteRequestSchema;

const CompareBodySchema = z
  .object({
    first: SiteRequestSchema,
    second: SiteRequestSchema
  })
  .strict();

export interface CreateServerOptions {
  readonly service: SiteComparisonService;
}

const statusCodeFor = (error: Error & { statusCode?: number }): number => {
  if (error instanceof z.ZodError) {
    return 400;
  }
  if (error instanceof IncompleteAssessmentError) {
    return 422;
  }
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return error.statusCode;
  }
  return 500;
};

export const createServer = (options: CreateServerOptions): FastifyInstance => {
  const app = Fastify({ logger: false });
  const service = options.service;

  app.get('/sites', async (_request, reply) => {
    return reply.send({ sites: service.listSites() });
  });

  app.post('/sites/assess', async (request, reply) => {
    const body = AssessBodySchema.parse(request.body ?? {});
    const result = await service.assess(body);

    return reply.send({
      assessment: result.assessment,
      report: result.report
    });
  });

  app.post('/sites/compare', async (request, reply) => {
    const body = CompareBodySchema.parse(request.body ?? {});
    const result = await service.compare(body.first, body.second);

    return reply.send({
      assessments: result.run.assessments,
      comparison: result.run.comparison,
      report: result.report
    });
  });

  app.setErrorHandler((error, _request, reply) => {
    const message = error instanceof z.ZodError ? error.issues.map((issue) => issue.message).join('; ') : error.message;
    reply.status(statusCodeFor(error)).send({ error: message });
  });

  return app;
};
