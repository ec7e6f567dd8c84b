import { tableFromArrays } from 'apache-arrow';
import { describe, it, expect } from 'vitest';

import { TableTypeError } from '../errors';
import { dependenciesOf } from '../markup/dependencies';
import { rootScope } from '../markup/scope';
import { outputTabulator, tableOutput, tabulatorBundle } from '../output/tabulator';
import { serializedPayloadSchema } from '../schemas/payload';

describe('TableOutput', () => {
  it('should build the same placeholder as outputTabulator', () => {
    const scope = rootScope.child('north');

    expect(tableOutput.uiFactory(scope, 'grid')).toEqual(
      outputTabulator(scope, 'grid')
    );
  });

  it('should pass mount point options through', () => {
    const element = tableOutput.uiFactory(rootScope, 'grid', { height: '50vh' });

    expect(element.properties.style).toBe('height: 50vh');
    expect(dependenciesOf(element)).toEqual([tabulatorBundle]);
  });

  it('should transform tables into a payload the wire schema accepts', () => {
    const payload = tableOutput.transform(
      tableFromArrays({ a: Int32Array.from([1]), b: ['x'] })
    );

    expect(payload).toEqual({
      data: [[1, 'x']],
      columns: ['a', 'b'],
      type_hints: ['int', 'string']
    });
    expect(serializedPayloadSchema.safeParse(payload).success).toBe(true);
  });

  it('should reject values that are not tables', () => {
    expect(() => tableOutput.transform(JSON.parse('[1, 2]'))).toThrow(
      TableTypeError
    );
  });
});

describe('serializedPayloadSchema', () => {
  it('should reject rows whose width differs from the columns', () => {
    const result = serializedPayloadSchema.safeParse({
      data: [[1, 2]],
      columns: ['a'],
      type_hints: ['int']
    });

    expect(result.success).toBe(false);
    expect(result.success ? [] : result.error.issues.map(issue => issue.message)).toEqual([
      'Expected 1 cells, got 2'
    ]);
  });

  it('should reject extra keys', () => {
    expect(
      serializedPayloadSchema.safeParse({
        data: [],
        columns: [],
        type_hints: [],
        index: []
      }).success
    ).toBe(false);
  });
});
