import { describe, it, expect } from 'vitest';

import { InvalidIdError } from '../errors';
import { Scope, resolveId, rootScope, withNamespace } from '../markup/scope';

describe('resolveId', () => {
  it('should leave top-level ids unchanged', () => {
    expect(resolveId('table', [])).toBe('table');
  });

  it('should prefix ids with every namespace on the stack', () => {
    expect(resolveId('table', ['page', 'north'])).toBe('page-north-table');
  });

  it('should give a nested id that differs from its top-level form', () => {
    expect(resolveId('table', ['north'])).not.toBe(resolveId('table', []));
  });

  it('should resolve the same id in the same scope identically', () => {
    const stack = ['north'];

    expect(resolveId('table', stack)).toBe(resolveId('table', stack));
  });

  it('should reject empty ids', () => {
    expect(() => resolveId('', [])).toThrow(InvalidIdError);
  });

  it('should reject ids with whitespace', () => {
    expect(() => resolveId('my table', [])).toThrow(
      'Invalid id "my table": ids must not contain whitespace'
    );
  });
});

describe('Scope', () => {
  it('should push namespaces with child() and leave the parent untouched', () => {
    const north = rootScope.child('north');
    const nested = north.child('detail');

    expect(nested.resolve('table')).toBe('north-detail-table');
    expect(north.resolve('table')).toBe('north-table');
    expect(rootScope.resolve('table')).toBe('table');
  });

  it('should freeze its namespace stack', () => {
    expect(Object.isFrozen(new Scope(['a']).namespaces)).toBe(true);
  });

  it('should validate namespaces', () => {
    expect(() => new Scope(['bad namespace'])).toThrow(InvalidIdError);
  });
});

describe('withNamespace', () => {
  it('should build inside the child scope and return the result', () => {
    const id = withNamespace(rootScope, 'south', scope => scope.resolve('table'));

    expect(id).toBe('south-table');
  });

  it('should keep sibling compositions apart', () => {
    const ids = ['north', 'south'].map(namespace =>
      withNamespace(rootScope, namespace, scope => scope.resolve('table'))
    );

    expect(ids).toEqual(['north-table', 'south-table']);
  });
});
