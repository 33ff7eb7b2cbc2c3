import { Value } from '@stratum/contracts';
import { IState } from '@stratum/state';
import { describe, expect, it } from 'vitest';

import { StateResolver } from '../../src/components/StateResolver';

const ref = (name: string, attribute: string = 'id'): Value => ({ type: 'Reference', value: { resourceType: 'aws_vpc', name, attribute } });

describe('StateResolver', () => {
  const state: IState = {
    version: 1,
    serial: 3,
    lineage: 'test-lineage',
    resources: {
      'aws_vpc.main': {
        resourceType: 'aws_vpc',
        name: 'main',
        id: 'vpc-00000001',
        inputs: { cidr_block: '10.0.0.0/16' },
        attributes: { cidr_block: '10.0.0.0/16', arn: 'arn:sim:ec2::vpc/vpc-00000001' },
        dependencies: [],
      },
    },
    outputs: {},
  };
  const resolver = new StateResolver(state);

  it('should resolve ids and attributes', () => {
    const attributes = resolver.resolveAttributes(
      {
        vpc_id: ref('main'),
        tags: { type: 'Map', value: { vpc: ref('main', 'arn'), team: { type: 'String', value: 'platform' } } },
        cidrs: { type: 'List', value: [ref('main', 'cidr_block')] },
      },
      'aws_subnet.public'
    );

    expect(attributes).toEqual({
      vpc_id: 'vpc-00000001',
      tags: { vpc: 'arn:sim:ec2::vpc/vpc-00000001', team: 'platform' },
      cidrs: ['10.0.0.0/16'],
    });
  });

  it('should fail on resources that have not been applied', () => {
    expect(() => resolver.resolve(ref('other'), 'aws_subnet.public')).toThrow(
      'Unresolved reference "aws_vpc.other.id" in "aws_subnet.public": "aws_vpc.other" has not been applied'
    );
  });

  it('should fail on attributes the resource does not have', () => {
    expect(() => resolver.resolve(ref('main', 'zone'), 'aws_subnet.public')).toThrow('attribute "zone" is not set on "aws_vpc.main"');
  });

  it('should resolve outputs', () => {
    expect(
      resolver.resolveOutputs([
        { name: 'vpc_id', value: ref('main') },
        { name: 'region', value: { type: 'String', value: 'eu-west-1' } },
      ])
    ).toEqual({ vpc_id: 'vpc-00000001', region: 'eu-west-1' });
  });
});
