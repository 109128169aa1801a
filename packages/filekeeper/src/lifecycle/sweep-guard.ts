/**
 * Sweep Guard
 *
 * At most one run of each sweep kind at a time. A second caller does not
 * queue behind the first; it gets `{ skipped: true }` back.
 */

export type SweepKind = 'aging' | 'archive' | 'retry' | 'reindex';

export type Guarded<T> = { skipped: true } | { skipped: false; result: T };

export class SweepGuard {
  private readonly running = new Set<SweepKind>();

  async run<T>(kind: SweepKind, fn: () => Promise<T>): Promise<Guarded<T>> {
    if (this.running.has(kind)) {
      return { skipped: true };
    }
    this.running.add(kind);
    try {
      return { skipped: false, result: await fn() };
    } finally {
      this.running.delete(kind);
    }
  }

  isRunning(kind: SweepKind): boolean {
    return this.running.has(kind);
  }
}
