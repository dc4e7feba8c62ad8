import { describe, it, expect } from 'vitest';
import { PathLock } from '../../../../src/shared/store/path-lock';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe('PathLock', () => {
  it('runs tasks on the same key one at a time, in order', async () => {
    const lock = new PathLock();
    const log: string[] = [];

    const task = (name: string) => async () => {
      log.push(`${name}:start`);
      await tick();
      log.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.runExclusive('a.json', task('one')),
      lock.runExclusive('a.json', task('two')),
      lock.runExclusive('a.json', task('three')),
    ]);

    expect(results).toEqual(['one', 'two', 'three']);
    expect(log).toEqual([
      'one:start',
      'one:end',
      'two:start',
      'two:end',
      'three:start',
      'three:end',
    ]);
  });

  it('does not serialize different keys', async () => {
    const lock = new PathLock();
    const log: string[] = [];

    await Promise.all([
      lock.runExclusive('a.json', async () => {
        log.push('a:start');
        await tick();
        log.push('a:end');
      }),
      lock.runExclusive('b.json', async () => {
        log.push('b:start');
        await tick();
        log.push('b:end');
      }),
    ]);

    expect(log.slice(0, 2)).toEqual(['a:start', 'b:start']);
  });

  it('a failing task does not block the next one', async () => {
    const lock = new PathLock();

    const failed = lock.runExclusive('a.json', () => Promise.reject(new Error('boom')));
    const next = lock.runExclusive('a.json', () => Promise.resolve('ok'));

    await expect(failed).rejects.toThrowError('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('forgets idle keys', async () => {
    const lock = new PathLock();
    await lock.runExclusive('a.json', () => Promise.resolve(1));
    expect(lock.size).toBe(0);
  });
});
