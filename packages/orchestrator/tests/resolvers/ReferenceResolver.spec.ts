import { describe, expect, it } from 'vitest';

import { ReferenceResolver } from '../../src/resolvers/ReferenceResolver';
import { VariableDefinition } from '../../src/resolvers/VariableResolver';

describe('ReferenceResolver', () => {
  const variables = new Map<string, VariableDefinition>([
    ['region', { value: { type: 'String', value: 'eu-west-1' } }],
    ['ports', { value: { type: 'List', value: [{ type: 'Number', value: 80 }] } }],
    ['unset', { description: 'no default' }],
  ]);
  const counts = new Map([['aws_subnet.public', 2]]);
  const resolver = new ReferenceResolver(variables, counts);
  const context = { address: 'aws_vpc.main' };

  it('should dispatch var references to variables', () => {
    expect(resolver.resolve([{ name: 'var' }, { name: 'region' }], context)).toEqual({ type: 'String', value: 'eu-west-1' });
  });

  it('should dispatch count references to the instance number', () => {
    expect(resolver.resolve([{ name: 'count' }, { name: 'index' }], { address: 'aws_subnet.public[1]', countIndex: 1 })).toEqual({ type: 'Number', value: 1 });
  });

  it('should turn everything else into a resource reference', () => {
    expect(resolver.resolve([{ name: 'aws_vpc' }, { name: 'main' }, { name: 'arn' }], { address: 'aws_subnet.a' })).toEqual({
      type: 'Reference',
      value: { resourceType: 'aws_vpc', name: 'main', attribute: 'arn' },
    });
  });

  it('should convert nested values', () => {
    const value = resolver.convert(
      {
        type: 'Map',
        value: {
          region: { type: 'Reference', value: [{ name: 'var' }, { name: 'region' }] },
          ports: { type: 'List', value: [{ type: 'Reference', value: [{ name: 'var' }, { name: 'ports', index: { type: 'Number', value: 0 } }] }] },
        },
      },
      context
    );

    expect(value).toEqual({
      type: 'Map',
      value: {
        region: { type: 'String', value: 'eu-west-1' },
        ports: { type: 'List', value: [{ type: 'Number', value: 80 }] },
      },
    });
  });

  it('should reject malformed resource references', () => {
    expect(() => resolver.resolve([{ name: 'aws_vpc' }, { name: 'main' }], context)).toThrow('expected <type>.<name>.<attribute>');
    expect(() => resolver.resolve([{ name: 'aws_vpc' }, { name: 'main', index: { type: 'Number', value: 0 } }, { name: 'id' }], context)).toThrow(
      '"aws_vpc.main" does not set count and cannot be indexed'
    );
    expect(() => resolver.resolve([{ name: 'aws_subnet' }, { name: 'public', index: { type: 'String', value: 'a' } }, { name: 'id' }], context)).toThrow(
      'instance index must be a number'
    );
  });

  it('should report variables without value', () => {
    expect(() => resolver.resolve([{ name: 'var' }, { name: 'unset' }], context)).toThrow('Invalid resource "aws_vpc.main": Variable "unset" has no value');
  });

  it('should evaluate indexes', () => {
    expect(resolver.index({ name: 'zones', index: { type: 'String', value: 'eu' } }, context)).toBe('eu');
    expect(resolver.index({ name: 'zones' }, context)).toBeUndefined();
    expect(() => resolver.index({ name: 'cidrs', index: { type: 'Number', value: -1 } }, context)).toThrow(
      'Unresolved reference "cidrs[-1]" in "aws_vpc.main": index must be a non-negative integer or a string'
    );
  });

  it('should list the addresses of depends_on entries', () => {
    expect(resolver.addresses([{ name: 'aws_subnet' }, { name: 'public' }], context).map(String)).toEqual(['aws_subnet.public[0]', 'aws_subnet.public[1]']);
    expect(resolver.addresses([{ name: 'aws_subnet' }, { name: 'public', index: { type: 'Number', value: 1 } }], context).map(String)).toEqual(['aws_subnet.public[1]']);
    expect(() => resolver.addresses([{ name: 'aws_vpc' }, { name: 'main' }, { name: 'id' }], context)).toThrow('depends_on entries must be <type>.<name>');
  });
});
