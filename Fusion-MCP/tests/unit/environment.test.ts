import { describe, it, expect } from 'vitest';
import { ExecutionEnvironment } from '../../src/runtime/environment.js';
import { pyInt, pyList } from '../../src/python/values.js';

describe('ExecutionEnvironment', () => {
  it('sorts bindings into values, functions and modules', () => {
    const env = new ExecutionEnvironment();
    env.interpreter.execute('import math\ndef area(r):\n    return r * r\nsides = [3, 4]');

    expect([...env.values.keys()]).toEqual(['sides']);
    expect([...env.functions.keys()]).toEqual(['area']);
    expect([...env.modules.keys()]).toEqual(['math']);
    expect(env.names()).toEqual(['sides', 'area', 'math']);
  });

  it('moves a name between tables when it is rebound', () => {
    const env = new ExecutionEnvironment();
    env.interpreter.execute('def f():\n    return 1\nx = 1\nx = f');

    expect(env.values.has('x')).toBe(false);
    expect(env.functions.has('x')).toBe(true);
  });

  it('removes a name from whichever table holds it', () => {
    const env = new ExecutionEnvironment();
    env.assign('n', pyInt(1));
    expect(env.remove('n')).toBe(true);
    expect(env.remove('n')).toBe(false);
    expect(env.has('n')).toBe(false);
  });

  it('snapshots only known names, as independent copies', () => {
    const env = new ExecutionEnvironment();
    env.assign('items', pyList([pyInt(1)]));

    const snapshot = env.snapshot(['items', 'missing']);
    env.interpreter.execute('items.append(2)');

    expect([...snapshot.keys()]).toEqual(['items']);
    expect(snapshot.get('items')).toEqual(pyList([pyInt(1)]));
    expect(env.lookup('items')).toEqual(pyList([pyInt(1), pyInt(2)]));
  });
});
