/**
 * Var tests
 */

import { describe, it, expect } from 'vitest';
import { Var } from '../variable.js';
import { ok, error } from '../output.js';

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('Var', () => {
  it('should return the current value and one watch named after the var', () => {
    const v = new Var('branch', ok('main'));
    const [output, watches] = v.get();

    expect(output).toEqual(ok('main'));
    expect(watches).toHaveLength(1);
    expect(watches[0].describe()).toBe('branch');
    expect(watches[0].cancel).toBeUndefined();
  });

  it('should fire changed once the value differs', async () => {
    const v = new Var('v', ok('A'));
    const [, [watch]] = v.get();
    let fired = false;
    void watch.changed().then(() => {
      fired = true;
    });

    v.set(ok('A'));
    await flush();
    expect(fired).toBe(false);

    v.set(ok('B'));
    await flush();
    expect(fired).toBe(true);
  });

  it('should never fire when every set used an equal value', async () => {
    const v = new Var('v', ok(1));
    const [, [watch]] = v.get();
    let fired = false;
    void watch.changed().then(() => {
      fired = true;
    });

    v.set(ok(1));
    v.set(ok(1));
    v.update((current) => current);
    await flush();

    expect(fired).toBe(false);
  });

  it('should not fire when the value returned to the observed one before waiting', async () => {
    const v = new Var('v', ok('A'));
    const [, [watch]] = v.get();
    v.set(ok('B'));
    v.set(ok('A'));

    let fired = false;
    void watch.changed().then(() => {
      fired = true;
    });
    await flush();

    expect(fired).toBe(false);
  });

  it('should fire immediately when the value already changed before waiting', async () => {
    const v = new Var('v', ok('A'));
    const [, [watch]] = v.get();
    v.set(ok('B'));

    await expect(watch.changed()).resolves.toBeUndefined();
  });

  it('should return the same promise from changed', () => {
    const v = new Var('v', ok(0));
    const [, [watch]] = v.get();
    expect(watch.changed()).toBe(watch.changed());
  });

  it('should apply update to the current value', () => {
    const v = new Var('counter', ok(1));
    v.update((current) => (current.kind === 'ok' ? ok(current.value + 1) : current));
    expect(v.current).toEqual(ok(2));
  });

  it('should treat a new error message as a change', async () => {
    const v = new Var<number>('v', error('first'));
    const [, [watch]] = v.get();
    let fired = false;
    void watch.changed().then(() => {
      fired = true;
    });

    v.set(error('first'));
    await flush();
    expect(fired).toBe(false);

    v.set(error('second'));
    await flush();
    expect(fired).toBe(true);
  });

  it('should use the custom equality for ok values', async () => {
    const v = new Var('v', ok('Hello'), (a, b) => a.toLowerCase() === b.toLowerCase());
    const [, [watch]] = v.get();
    let fired = false;
    void watch.changed().then(() => {
      fired = true;
    });

    v.set(ok('HELLO'));
    await flush();
    expect(fired).toBe(false);

    v.set(ok('bye'));
    await flush();
    expect(fired).toBe(true);
  });

  it('should allow release without effect', () => {
    const v = new Var('v', ok(1));
    const [, [watch]] = v.get();
    expect(() => watch.release()).not.toThrow();
    expect(v.current).toEqual(ok(1));
  });

  it('should withdraw a pending wait on release', () => {
    const v = new Var('v', ok(1));
    const [, [kept]] = v.get();
    const [, [dropped]] = v.get();
    void kept.changed();
    void dropped.changed();
    expect(v.waiting).toBe(2);

    dropped.release();
    expect(v.waiting).toBe(1);
    expect(v.current).toEqual(ok(1));
  });

  it('should be usable as an input', () => {
    const v = new Var('v', ok('x'));
    const [output, watches] = v.input();
    expect(output).toEqual(ok('x'));
    expect(watches[0].describe()).toBe('v');
  });
});
