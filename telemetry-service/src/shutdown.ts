import { SERVICE } from './config.js';
import type { Acceptor } from './server.js';

/**
 * Flip the shutdown flag on SIGINT/SIGTERM, wait for open connections to
 * close, then exit. Further signals during the drain are ignored.
 * Returns a function that removes the signal handlers.
 */
export function registerShutdown(
  controller: AbortController,
  acceptor: Acceptor,
  exit: (code: number) => void = (code) => process.exit(code)
): () => void {
  const shutdown = (signal: string) => {
    if (controller.signal.aborted) {
      console.log(`[${SERVICE}] received ${signal}, already draining (${acceptor.stats().active} open)`);
      return;
    }
    console.log(`[${SERVICE}] received ${signal}, shutting down...`);
    controller.abort();
    acceptor.drain().then(
      () => {
        console.log(`[${SERVICE}] shutdown complete`);
        exit(0);
      },
      (e: unknown) => {
        console.error(`[${SERVICE}] drain failed:`, e);
        exit(1);
      }
    );
  };
  const onSigint = () => shutdown('SIGINT');
  const onSigterm = () => shutdown('SIGTERM');
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);
  return () => {
    process.off('SIGINT', onSigint);
    process.off('SIGTERM', onSigterm);
  };
}
