import { describe, expect, it } from 'vitest';
import { AssertError } from '../assert';
import { CompositeCoder, NSArrayCoder, NSDictionaryCoder, NSSetCoder } from './builtin-coders';
import { CoderRegistry } from './coder-registry';
import { defaultMaxDepth, resolveUnarchiveOptions } from './options';

describe('CoderRegistry', () => {
  it('knows the builtin vocabulary', () => {
    const registry = CoderRegistry.withBuiltins();

    expect(registry.getClass('NSArray')).toBe(NSArrayCoder);
    expect(registry.getClass('NSMutableArray')).toBe(NSArrayCoder);
    expect(registry.getClass('NSMutableDictionary')).toBe(NSDictionaryCoder);
    expect(registry.getClass('NSMutableSet')).toBe(NSSetCoder);
    expect(registry.getClass('BTMUserSettings')).toBe(CompositeCoder);
    expect(registry.classNames).toHaveLength(21);
  });

  it('matches class names exactly', () => {
    const registry = CoderRegistry.withBuiltins();

    expect(registry.getClass('nsarray')).toBeUndefined();
    expect(registry.getClass('NSArray ')).toBeUndefined();
  });

  it('allows registering the same coder twice', () => {
    const registry = new CoderRegistry().register(NSArrayCoder);

    expect(() => registry.setClass(NSArrayCoder, 'NSArray')).not.toThrow();
  });

  it('rejects a second coder for a taken name', () => {
    const registry = new CoderRegistry().register(NSArrayCoder);

    expect(() => registry.setClass(NSSetCoder, 'NSMutableArray')).toThrow(AssertError);
    expect(() => registry.setClass(NSSetCoder, 'NSMutableArray')).toThrow('Coder for class name NSMutableArray already exists');
  });

  it('rejects an empty class name', () => {
    expect(() => new CoderRegistry().setClass(CompositeCoder, '')).toThrow(AssertError);
  });
});

describe('resolveUnarchiveOptions', () => {
  it('fills in defaults', () => {
    const resolved = resolveUnarchiveOptions();

    expect(resolved.setDecoding).toBe('members');
    expect(resolved.memoize).toBe(true);
    expect(resolved.maxDepth).toBe(defaultMaxDepth);
    expect(resolved.registry.getClass('Profile')).toBeUndefined();
  });

  it('adds composite class names', () => {
    const resolved = resolveUnarchiveOptions({ compositeClassNames: ['Profile', 'Bookmark'] });

    expect(resolved.registry.getClass('Profile')).toBe(CompositeCoder);
  });

  it('refuses to turn a container class into a composite', () => {
    expect(() => resolveUnarchiveOptions({ compositeClassNames: ['NSDictionary'] })).toThrow(AssertError);
  });

  it('rejects a depth limit that is not a positive integer', () => {
    expect(() => resolveUnarchiveOptions({ maxDepth: 0 })).toThrow('maxDepth must be a positive integer, got 0');
    expect(() => resolveUnarchiveOptions({ maxDepth: 1.5 })).toThrow(AssertError);
  });
});
