import Fastify, { type FastifyBaseLogger } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import { loadEnv } from './load_env.js';
import { parseConfig } from './config.js';
import { createLogger } from './logger.js';
import { ResultCache } from './cache/result_cache.js';
import { createInferenceClient } from './inference/create_client.js';
import { FrameRelay } from './relay/frame_relay.js';
import { TelemetrySampler } from './telemetry/telemetry.sampler.js';
import { createSystemProbe, detectPlatform } from './telemetry/system.probe.js';
import { registerRoutes } from './http/routes.js';
import { createWsHub } from './ws/hub.js';
import { createShutdown } from './shutdown.js';

async function boot() {
  const envPath = loadEnv();
  const config = parseConfig(process.env);
  const logger = createLogger(config.logLevel);
  const fastifyLogger: FastifyBaseLogger = logger;
  const fastify = Fastify({ loggerInstance: fastifyLogger, bodyLimit: 16 * 1024 * 1024 });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: 'Live VLM Relay',
        version: '0.1.0'
      }
    }
  });
  await fastify.register(swaggerUI, { routePrefix: '/docs' });

  const cache = new ResultCache(config.historySize);
  const client = createInferenceClient(config.vlm, logger);
  const relay = new FrameRelay({
    client,
    cache,
    settings: {
      process_every_n_frames: config.processEveryNFrames,
      prompt: config.vlm.prompt,
      model: config.vlm.model,
      max_tokens: config.vlm.maxTokens
    },
    timeoutMs: config.vlm.timeoutMs,
    logger
  });

  const platform = await detectPlatform(config.telemetry.platform);
  const sampler = new TelemetrySampler({
    probe: createSystemProbe({ platform, commandTimeoutMs: config.telemetry.probeTimeoutMs }),
    cache,
    intervalMs: config.telemetry.intervalMs,
    probeTimeoutMs: config.telemetry.probeTimeoutMs,
    logger
  });

  registerRoutes(fastify, { relay, cache, sampler, client, wsPath: config.wsPath });

  const hub = createWsHub({
    server: fastify.server,
    path: config.wsPath,
    relay,
    cache,
    pushIntervalMs: config.pushIntervalMs,
    logger
  });

  if (client.provider === 'openai') {
    const check = await client.testConnection();
    if (!check.ok) {
      logger.warn({ error: check.error, api_base: config.vlm.apiBase }, 'VLM endpoint not reachable yet');
    }
  }

  sampler.start();
  await fastify.listen({ port: config.port, host: config.host });
  logger.info(
    { env: envPath, provider: client.provider, model: config.vlm.model, platform, ws: config.wsPath },
    `Relay listening on :${config.port}`
  );

  const shutdown = createShutdown({ hub, sampler, relay, server: fastify, logger });
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        (ran) => {
          if (ran) process.exit(0);
        },
        (error: unknown) => {
          logger.error({ err: error }, 'shutdown failed');
          process.exit(1);
        }
      );
    });
  }
}

boot().catch((error) => {
  console.error('Fatal boot error', error);
  process.exit(1);
});
