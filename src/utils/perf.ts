import { performance } from 'perf_hooks';
import { isDebugEnabled, type Logger } from './debug';

/**
 * Wall-clock timer for indexing work. Only reports when the `perf` debug flag is on.
 */
export class PerfTimer {
  private readonly startedAt = performance.now();

  constructor(
    private readonly label: string,
    private readonly logger?: Logger
  ) {}

  stop(details?: Record<string, string | number>): number {
    const elapsed = performance.now() - this.startedAt;
    if (this.logger && isDebugEnabled('perf')) {
      const suffix = details
        ? ' ' + Object.entries(details).map(([key, value]) => `${key}=${value}`).join(' ')
        : '';
      this.logger.log(`[perf] ${this.label} ${elapsed.toFixed(1)}ms${suffix}`);
    }
    return elapsed;
  }
}

export function time<T>(label: string, logger: Logger | undefined, fn: () => T): T {
  const timer = new PerfTimer(label, logger);
  try {
    return fn();
  } finally {
    timer.stop();
  }
}
