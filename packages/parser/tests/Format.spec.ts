import { describe, expect, it } from 'vitest';

import { parseConfig, parseValuesFile, renderReference } from '../src/index';

describe('parseConfig', () => {
  it('should name the file in parse errors', () => {
    expect(() => parseConfig('resource "a" {', 'network.stf')).toThrow('network.stf: [Line 1, Column 14] Expect resource name string after resource type.');
  });

  it('should leave the message alone without a file name', () => {
    expect(() => parseValuesFile('= 1')).toThrow(/^\[Line 1, Column 1\] Expect variable name\.$/);
  });
});

describe('renderReference', () => {
  it('should render indexed segments', () => {
    expect(
      renderReference([
        { name: 'aws_subnet' },
        { name: 'public', index: { type: 'Reference', value: [{ name: 'count' }, { name: 'index' }] } },
        { name: 'id' },
      ])
    ).toBe('aws_subnet.public[count.index].id');
  });

  it('should quote string indexes', () => {
    expect(renderReference([{ name: 'var' }, { name: 'zones', index: { type: 'String', value: 'eu' } }])).toBe('var.zones["eu"]');
  });
});
