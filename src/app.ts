import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { TariffGateConfig } from './config.js';
import { ENGINE_VERSION } from './crypto/audit-log.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import type { ClassificationService } from './services/classification-service.js';
import type { ErrorResponse } from './types/index.js';

const productLineSchema = z.object({
  description: z.string().trim().min(1).max(2000),
  quantity: z.union([z.number(), z.string()]).optional(),
  declared_origin: z.string().optional(),
  declared_value: z.union([z.number(), z.string()]).optional()
});

export const classifyBodySchema = z.object({
  request_id: z.string().min(1).max(100).optional(),
  lines: z.array(productLineSchema).min(1).max(100),
  context: z.string().max(20_000).default(''),
  subject: z.string().max(500).optional(),
  message_id: z.string().max(500).optional(),
  enrichment: z.string().max(50_000).optional()
});

export interface AppDependencies {
  config: Pick<TariffGateConfig, 'auth' | 'rate_limits'>;
  service: ClassificationService;
  backends: string[];
  tools: string[];
  auditLog?: { verify(): { valid: boolean; errors: string[] } };
  logger: Logger;
}

function bearerToken(header: string | undefined): string | undefined {
  const match = header?.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim();
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { config, service, logger } = deps;
  const apiKeys = new Set(config.auth.api_keys);

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.auth.allowed_origins,
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  app.addHook('onRequest', async (request, reply) => {
    if (!request.url.startsWith('/api/classify')) return;

    const apiKey = bearerToken(request.headers.authorization);
    if (!apiKey || !apiKeys.has(apiKey)) {
      const response: ErrorResponse = {
        request_id: uuidv4(),
        error_code: 'UNAUTHORIZED',
        message: 'Missing or invalid API key'
      };
      return reply.status(401).send(response);
    }
  });

  app.get('/api/health', async () => {
    const verification = deps.auditLog?.verify();
    return {
      status: 'healthy',
      version: ENGINE_VERSION,
      backends: deps.backends,
      tools: deps.tools,
      audit_log_valid: verification ? verification.valid : null
    };
  });

  app.post('/api/classify', async (request, reply) => {
    const parsed = classifyBodySchema.safeParse(request.body);
    if (!parsed.success) {
      const response: ErrorResponse = {
        request_id: uuidv4(),
        error_code: 'INVALID_REQUEST',
        message: parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
      };
      return reply.status(400).send(response);
    }

    // Stop the tool loop when the client goes away
    const controller = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) controller.abort();
    });

    try {
      const payload = await service.classify(parsed.data, { signal: controller.signal });
      if (payload.status === 'no_classification' && payload.degraded_reasons.includes('provider_failure')) {
        reply.status(503);
      }
      return payload;
    } catch (error) {
      logger.error({ err: errorMessage(error) }, 'Classify handler failed');
      const response: ErrorResponse = {
        request_id: parsed.data.request_id ?? uuidv4(),
        error_code: 'INTERNAL',
        message: 'Classification failed'
      };
      return reply.status(500).send(response);
    }
  });

  return app;
}
