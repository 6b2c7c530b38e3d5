import { createLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';
import { parsePositiveInt } from '../config/env-utils';

const logger = createLogger('graceful-shutdown');

type ShutdownHook = () => Promise<void>;

export type ShutdownPhase = 'schedulers' | 'connections';

const PHASE_ORDER: ShutdownPhase[] = ['schedulers', 'connections'];

interface PhasedHook {
  phase: ShutdownPhase;
  hook: ShutdownHook;
  label?: string;
}

const phasedHooks: PhasedHook[] = [];
let isShuttingDown = false;

export function registerPhasedShutdownHook(phase: ShutdownPhase, hook: ShutdownHook, label?: string): void {
  phasedHooks.push({ phase, hook, label });
  logger.debug('Registered phased shutdown hook', { phase, label });
}

/**
 * Run every registered hook phase by phase. A failing hook is logged and the
 * remaining hooks still run.
 */
async function runShutdownHooks(): Promise<void> {
  for (const phase of PHASE_ORDER) {
    const hooksForPhase = phasedHooks.filter(h => h.phase === phase);
    if (hooksForPhase.length === 0) continue;

    logger.info(`Executing shutdown phase: ${phase}`, { hookCount: hooksForPhase.length });
    for (const { hook, label } of hooksForPhase) {
      try {
        await hook();
        if (label) logger.debug(`Shutdown hook completed: ${label}`);
      } catch (error) {
        logger.error('Phased shutdown hook failed', { phase, label, error: serializeError(error) });
      }
    }
  }
}

export function setupGracefulShutdown(server?: { close: (callback: () => void) => void }, timeoutMs?: number): void {
  const timeout = timeoutMs ?? parsePositiveInt('SHUTDOWN_TIMEOUT_MS', 30000, 100);

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown (timeout: ${timeout}ms)`);

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, timeout);

    try {
      if (server) {
        await new Promise<void>(resolve => server.close(() => resolve()));
        logger.info('HTTP server closed');
      }

      await runShutdownHooks();

      logger.info('Graceful shutdown complete');
      clearTimeout(timer);
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', { error: serializeError(error) });
      clearTimeout(timer);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
