import type { FastifyInstance } from 'fastify';
import type { FrameRelay } from '../relay/frame_relay.js';
import type { ResultCache } from '../cache/result_cache.js';
import type { TelemetrySampler } from '../telemetry/telemetry.sampler.js';
import type { InferenceClient } from '../inference/inference_client.js';
import { buildStatusPage } from './status_page.js';

export type RouteDeps = {
  relay: FrameRelay;
  cache: ResultCache;
  sampler: TelemetrySampler;
  client: InferenceClient;
  wsPath: string;
};

export function registerRoutes(fastify: FastifyInstance, deps: RouteDeps) {
  fastify.get('/health', {
    schema: {
      description: 'Basic health check',
      response: {
        200: {
          type: 'object',
          properties: { ok: { type: 'boolean' } }
        }
      }
    }
  }, async () => ({ ok: true }));

  fastify.get('/status', {
    schema: {
      description: 'Relay counters, relay settings and telemetry circuit state'
    }
  }, async () => ({
    ok: true,
    provider: deps.client.provider,
    provider_ready: deps.client.isReady(),
    settings: deps.relay.settings(),
    relay: deps.relay.stats(),
    latency: deps.cache.latencyStats(),
    telemetry: {
      running: deps.sampler.isRunning(),
      circuit: deps.sampler.circuit(),
      probe_calls: deps.sampler.probeCallCount()
    }
  }));

  fastify.get('/snapshot.json', {
    schema: {
      description: 'Latest inference result, telemetry sample, latency stats and rolling histories'
    }
  }, async () => ({
    ...deps.cache.snapshot(),
    processing: deps.relay.isBusy()
  }));

  fastify.post('/config', {
    schema: {
      description: 'Update relay settings with any subset of process_every_n_frames, prompt, model, max_tokens'
    }
  }, async (request, reply) => {
    const result = deps.relay.configure(request.body ?? {});
    if (!result.ok) {
      return reply.code(400).send({ error: 'invalid_config', issues: result.issues });
    }
    return { ok: true, settings: result.settings, changed: result.changed };
  });

  fastify.get('/', {
    schema: {
      description: 'Status page',
      response: {
        200: { type: 'string' }
      }
    }
  }, async (_, reply) => {
    return reply.type('text/html').send(buildStatusPage(deps.wsPath));
  });
}
