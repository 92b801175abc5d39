/**
 * Condition tests
 */

import { describe, it, expect } from 'vitest';
import { Condition } from '../condition.js';

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('Condition', () => {
  it('should wake every waiter on broadcast', async () => {
    const cond = new Condition();
    const woken: string[] = [];
    void cond.wait().then(() => woken.push('a'));
    void cond.wait().then(() => woken.push('b'));
    expect(cond.waiting).toBe(2);

    cond.broadcast();
    await flush();

    expect(woken.sort()).toEqual(['a', 'b']);
    expect(cond.waiting).toBe(0);
  });

  it('should not wake waiters registered after the broadcast', async () => {
    const cond = new Condition();
    let woken = 0;
    cond.broadcast();
    void cond.wait().then(() => woken++);
    await flush();
    expect(woken).toBe(0);

    cond.broadcast();
    await flush();
    expect(woken).toBe(1);
  });

  it('should make a waiter that re-waits wait for the next broadcast', async () => {
    const cond = new Condition();
    let rounds = 0;
    const loop = async () => {
      while (rounds < 2) {
        await cond.wait();
        rounds++;
      }
    };
    const done = loop();

    cond.broadcast();
    await flush();
    expect(rounds).toBe(1);

    cond.broadcast();
    await done;
    expect(rounds).toBe(2);
  });

  it('should drop a waiter whose signal aborts', async () => {
    const cond = new Condition();
    const abandoned = new AbortController();
    let woken = 0;
    void cond.wait(abandoned.signal).then(() => woken++);
    void cond.wait().then(() => woken++);
    expect(cond.waiting).toBe(2);

    abandoned.abort();
    expect(cond.waiting).toBe(1);

    cond.broadcast();
    await flush();
    expect(woken).toBe(1);
  });

  it('should never register a wait whose signal is already aborted', () => {
    const cond = new Condition();
    const abandoned = new AbortController();
    abandoned.abort();

    void cond.wait(abandoned.signal);
    expect(cond.waiting).toBe(0);
  });

  it('should ignore an abort after the waiter was woken', async () => {
    const cond = new Condition();
    const abandoned = new AbortController();
    let woken = 0;
    void cond.wait(abandoned.signal).then(() => woken++);

    cond.broadcast();
    abandoned.abort();
    await flush();

    expect(woken).toBe(1);
    expect(cond.waiting).toBe(0);
  });
});
