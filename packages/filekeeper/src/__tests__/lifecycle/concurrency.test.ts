/**
 * Path lock and sweep guard tests
 */

import { describe, it, expect } from 'vitest';
import { PathLocks } from '../../lifecycle/path-locks.js';
import { SweepGuard } from '../../lifecycle/sweep-guard.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('PathLocks', () => {
  it('runs operations on one path one at a time, in arrival order', async () => {
    const locks = new PathLocks();
    const gate = deferred();
    const log: string[] = [];

    const first = locks.withLock('notes/a.md', async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
    });
    const second = locks.withLock('notes/a.md', async () => {
      log.push('second');
    });

    await new Promise(resolve => setTimeout(resolve, 0));
    expect(log).toEqual(['first:start']);
    expect(locks.isLocked('notes/a.md')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(log).toEqual(['first:start', 'first:end', 'second']);
    expect(locks.isLocked('notes/a.md')).toBe(false);
  });

  it('lets different paths proceed independently', async () => {
    const locks = new PathLocks();
    const gate = deferred();
    const log: string[] = [];

    const blocked = locks.withLock('notes/a.md', async () => {
      await gate.promise;
      log.push('a');
    });
    await locks.withLock('notes/b.md', async () => {
      log.push('b');
    });

    expect(log).toEqual(['b']);
    gate.resolve();
    await blocked;
    expect(log).toEqual(['b', 'a']);
  });

  it('releases the lock when the operation throws', async () => {
    const locks = new PathLocks();
    await expect(
      locks.withLock('notes/a.md', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(locks.isLocked('notes/a.md')).toBe(false);
    await expect(locks.withLock('notes/a.md', async () => 'ok')).resolves.toBe('ok');
  });

  it('takes overlapping key sets without deadlock', async () => {
    const locks = new PathLocks();
    const results = await Promise.all([
      locks.withLocks(['b', 'a'], async () => 'ba'),
      locks.withLocks(['a', 'b', 'a'], async () => 'ab'),
    ]);
    expect(results).toEqual(['ba', 'ab']);
    expect(locks.isLocked('a')).toBe(false);
    expect(locks.isLocked('b')).toBe(false);
  });
});

describe('SweepGuard', () => {
  it('skips a second run of the same kind while one is in progress', async () => {
    const guard = new SweepGuard();
    const gate = deferred();

    const first = guard.run('aging', async () => {
      await gate.promise;
      return 'done';
    });
    const second = await guard.run('aging', async () => 'never');

    expect(second).toEqual({ skipped: true });
    expect(guard.isRunning('aging')).toBe(true);

    gate.resolve();
    expect(await first).toEqual({ skipped: false, result: 'done' });
    expect(guard.isRunning('aging')).toBe(false);
  });

  it('lets different kinds run at the same time', async () => {
    const guard = new SweepGuard();
    const gate = deferred();
    const aging = guard.run('aging', () => gate.promise);

    expect(await guard.run('archive', async () => 1)).toEqual({ skipped: false, result: 1 });

    gate.resolve();
    await aging;
  });
});
