import type { Logger } from './logger.js';

export type ShutdownParts = {
  hub: { close(): Promise<void> };
  sampler: { stop(): Promise<void> };
  relay: { drain(): Promise<void> };
  server: { close(): PromiseLike<unknown> };
  logger: Logger;
};

/**
 * Stops intake before draining: the hub closes first so no frame can start an
 * inference while the relay drains. Resolves false when already shutting down.
 */
export function createShutdown(parts: ShutdownParts): (signal: string) => Promise<boolean> {
  let closing = false;
  return async (signal) => {
    if (closing) return false;
    closing = true;
    parts.logger.info({ signal }, 'shutting down');
    await parts.hub.close();
    await parts.sampler.stop();
    await parts.relay.drain();
    await parts.server.close();
    return true;
  };
}
