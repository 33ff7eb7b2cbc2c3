import { SchemaError, StateLockedError } from '@stratum/contracts';
import { addressOf, PlanAction } from '@stratum/planner';
import { SimulatedCloudProvider } from '@stratum/provider-sim';
import { MemoryBackend, StateManager } from '@stratum/state';
import { beforeEach, describe, expect, it } from 'vitest';

import { Orchestrator } from '../src/index';

const network = `
  variable "cidr" { default = "10.0.0.0/16" }

  resource "aws_vpc" "main" { cidr_block = var.cidr }
  resource "aws_internet_gateway" "gw" { vpc_id = aws_vpc.main.id }
  resource "aws_route_table" "public" { vpc_id = aws_vpc.main.id }
  resource "aws_subnet" "public" {
    vpc_id = aws_vpc.main.id
    cidr_block = "10.0.1.0/24"
  }
  resource "aws_route" "default" {
    route_table_id = aws_route_table.public.id
    destination_cidr_block = "0.0.0.0/0"
    gateway_id = aws_internet_gateway.gw.id
  }

  output "vpc_id" { value = aws_vpc.main.id }
  output "vpc_arn" { value = aws_vpc.main.arn }
`;

const summary = (actions: PlanAction[]) => actions.map((action) => `${action.type} ${addressOf(action)}`);
const fast = { minDelayMs: 0, maxDelayMs: 0 };

describe('Orchestrator', () => {
  let backend: MemoryBackend;
  let provider: SimulatedCloudProvider;
  let orchestrator: Orchestrator;

  function setup(cloud: SimulatedCloudProvider = new SimulatedCloudProvider()): void {
    provider = cloud;
    orchestrator = new Orchestrator(new StateManager(backend));
    orchestrator.registerProvider(provider);
  }

  beforeEach(() => {
    backend = new MemoryBackend();
    setup();
  });

  describe('validate', () => {
    it('should reject resource types without provider', async () => {
      await expect(orchestrator.validate(`resource "gcp_network" "main" {}`)).rejects.toThrow(
        'Invalid resource "gcp_network.main": No provider registered for resource type "gcp_network"'
      );
    });

    it('should report every schema issue of a resource', async () => {
      const config = `
        resource "aws_route" "both" {
          route_table_id = "rtb-1"
          gateway_id = "igw-1"
          nat_gateway_id = "nat-1"
          arn = "arn"
        }
      `;

      await expect(orchestrator.validate(config)).rejects.toThrow(SchemaError);
      await expect(orchestrator.validate(config)).rejects.toThrow(
        'Invalid resource "aws_route.both": Unknown attribute "arn"; Missing required attribute "destination_cidr_block"; Exactly one of "gateway_id", "nat_gateway_id" must be set (found 2)'
      );
    });

    it('should return the desired state', async () => {
      const desired = await orchestrator.validate(network);

      expect(desired.resources).toHaveLength(5);
      expect(desired.outputs.map((output) => output.name)).toEqual(['vpc_id', 'vpc_arn']);
    });
  });

  describe('plan', () => {
    it('should order creates by dependencies, then by type and name', async () => {
      const { actions } = await orchestrator.plan(network);

      expect(summary(actions)).toEqual([
        'CREATE aws_vpc.main',
        'CREATE aws_internet_gateway.gw',
        'CREATE aws_route_table.public',
        'CREATE aws_subnet.public',
        'CREATE aws_route.default',
      ]);
      expect(actions[4].dependencies).toEqual(['aws_internet_gateway.gw', 'aws_route_table.public']);
    });

    it('should release the lock after planning', async () => {
      await orchestrator.plan(network);

      expect(await backend.getLock()).toBeNull();
    });

    it('should refuse to run while another process holds the lock', async () => {
      await backend.lock({ id: 'other', operation: 'apply', who: 'ci@runner', created: '2026-01-01T00:00:00.000Z' });

      await expect(orchestrator.plan(network)).rejects.toThrow(StateLockedError);
      await expect(orchestrator.plan(network)).rejects.toThrow('State is locked by another process (lock other, apply by ci@runner since 2026-01-01T00:00:00.000Z).');
    });

    it('should report cycles', async () => {
      const config = `
        resource "aws_security_group" "a" { name = "a" vpc_id = aws_security_group.b.id }
        resource "aws_security_group" "b" { name = "b" vpc_id = aws_security_group.a.id }
      `;

      await expect(orchestrator.plan(config)).rejects.toThrow('Dependency cycle detected: aws_security_group.a -> aws_security_group.b -> aws_security_group.a');
    });
  });

  describe('apply', () => {
    it('should create everything and record outputs', async () => {
      const result = await orchestrator.apply(network, {}, fast);

      expect(result.complete).toBe(true);
      expect(result.outputs).toEqual({ vpc_id: 'vpc-00000001', vpc_arn: 'arn:sim:ec2::vpc/vpc-00000001' });
      expect(Object.keys(result.state.resources).sort()).toEqual([
        'aws_internet_gateway.gw',
        'aws_route.default',
        'aws_route_table.public',
        'aws_subnet.public',
        'aws_vpc.main',
      ]);
      expect(await provider.objects()).toHaveLength(5);
      expect(await orchestrator.outputs()).toEqual(result.outputs);
    });

    it('should converge: a second plan is empty', async () => {
      await orchestrator.apply(network, {}, fast);

      const { actions } = await orchestrator.plan(network);

      expect(actions).toEqual([]);
    });

    it('should replace a resource and everything that depends on it', async () => {
      await orchestrator.apply(network, {}, fast);

      const result = await orchestrator.apply(network, { cidr: '10.1.0.0/16' }, fast);

      expect(summary(result.actions)).toEqual([
        'DELETE aws_route.default',
        'DELETE aws_subnet.public',
        'DELETE aws_internet_gateway.gw',
        'DELETE aws_route_table.public',
        'DELETE aws_vpc.main',
        'CREATE aws_vpc.main',
        'CREATE aws_internet_gateway.gw',
        'CREATE aws_route_table.public',
        'CREATE aws_subnet.public',
        'CREATE aws_route.default',
      ]);
      expect(result.complete).toBe(true);
      expect(result.outputs.vpc_id).toBe('vpc-00000006');
      expect(await provider.objects()).toHaveLength(5);
    });

    it('should keep the applied prefix when an operation fails', async () => {
      setup(new SimulatedCloudProvider({ faults: [{ operation: 'create', resourceType: 'aws_route', code: 'InvalidParameterValue', retryable: false }] }));

      const result = await orchestrator.apply(network, {}, fast);

      expect(result.complete).toBe(false);
      expect(result.results.map((item) => item.status)).toEqual(['SUCCEEDED', 'SUCCEEDED', 'SUCCEEDED', 'SUCCEEDED', 'FAILED']);
      expect(result.outputs).toEqual({});
      expect(Object.keys(result.state.resources)).not.toContain('aws_route.default');

      setup(new SimulatedCloudProvider());
      expect(summary((await orchestrator.plan(network)).actions)).toEqual(['CREATE aws_route.default']);
    });

    it('should retry transient provider failures', async () => {
      setup(new SimulatedCloudProvider({ faults: [{ resourceType: 'aws_vpc', code: 'Throttling', retryable: true, times: 2 }] }));

      const result = await orchestrator.apply(network, {}, fast);

      expect(result.complete).toBe(true);
      expect(result.results[0].attempts).toBe(3);
    });

    it('should refuse a stale saved plan', async () => {
      const { actions } = await orchestrator.plan(network);
      await orchestrator.apply(network, {}, fast);

      await expect(orchestrator.apply(network, {}, { ...fast, plan: actions })).rejects.toThrow('Saved plan is stale');
      expect(await backend.getLock()).toBeNull();
    });

    it('should apply a saved plan that still matches', async () => {
      const { actions } = await orchestrator.plan(network);

      const result = await orchestrator.apply(network, {}, { ...fast, plan: JSON.parse(JSON.stringify(actions)) });

      expect(result.complete).toBe(true);
    });

    it('should replace a dependent that references a replaced resource', async () => {
      const service = (port: number) => `
        resource "aws_vpc" "main" { cidr_block = "10.0.0.0/16" }
        resource "aws_subnet" "app" {
          vpc_id = aws_vpc.main.id
          cidr_block = "10.0.2.0/24"
        }
        resource "aws_lb_target_group" "web" {
          name = "web"
          port = ${port}
          protocol = "HTTP"
          vpc_id = aws_vpc.main.id
        }
        resource "aws_autoscaling_group" "web" {
          name = "web"
          min_size = 1
          max_size = 2
          vpc_zone_identifier = [aws_subnet.app.id]
          target_group_arns = [aws_lb_target_group.web.arn]
          launch_template = { name = "web" }
        }
      `;
      await orchestrator.apply(service(80), {}, fast);

      const result = await orchestrator.apply(service(8080), {}, fast);

      expect(summary(result.actions)).toEqual([
        'DELETE aws_autoscaling_group.web',
        'DELETE aws_lb_target_group.web',
        'CREATE aws_lb_target_group.web',
        'CREATE aws_autoscaling_group.web',
      ]);
      expect(result.complete).toBe(true);
      expect(result.state.resources['aws_autoscaling_group.web'].attributes.target_group_arns).toEqual([
        result.state.resources['aws_lb_target_group.web'].attributes.arn,
      ]);
      expect(await provider.objects()).toHaveLength(4);
    });

    it('should switch a route to a NAT gateway before deleting the internet gateway', async () => {
      const routed = (target: string, extra: string) => `
        resource "aws_vpc" "main" { cidr_block = "10.0.0.0/16" }
        resource "aws_subnet" "public" {
          vpc_id = aws_vpc.main.id
          cidr_block = "10.0.1.0/24"
        }
        resource "aws_route_table" "public" { vpc_id = aws_vpc.main.id }
        resource "aws_route" "default" {
          route_table_id = aws_route_table.public.id
          destination_cidr_block = "0.0.0.0/0"
          ${target}
        }
        ${extra}
      `;
      await orchestrator.apply(routed('gateway_id = aws_internet_gateway.gw.id', 'resource "aws_internet_gateway" "gw" { vpc_id = aws_vpc.main.id }'), {}, fast);

      const result = await orchestrator.apply(
        routed(
          'nat_gateway_id = aws_nat_gateway.main.id',
          `resource "aws_eip" "nat" { domain = "vpc" }
           resource "aws_nat_gateway" "main" {
             allocation_id = aws_eip.nat.id
             subnet_id = aws_subnet.public.id
           }`
        ),
        {},
        fast
      );

      expect(summary(result.actions)).toEqual(['CREATE aws_eip.nat', 'CREATE aws_nat_gateway.main', 'UPDATE aws_route.default', 'DELETE aws_internet_gateway.gw']);
      expect(result.complete).toBe(true);
      expect(result.state.resources['aws_route.default'].attributes.nat_gateway_id).toBe(result.state.resources['aws_nat_gateway.main'].id);
      expect(result.state.resources['aws_internet_gateway.gw']).toBeUndefined();
    });

    it('should update attributes that do not force replacement', async () => {
      const tagged = (team: string) => `resource "aws_s3_bucket" "assets" {
        bucket = "assets"
        tags = { team = "${team}" }
      }`;
      await orchestrator.apply(tagged('web'), {}, fast);

      const result = await orchestrator.apply(tagged('platform'), {}, fast);

      expect(summary(result.actions)).toEqual(['UPDATE aws_s3_bucket.assets']);
      expect(result.actions[0].changes).toEqual({ tags: { old: { team: 'web' }, new: { team: 'platform' }, computed: false } });
      expect(result.state.resources['aws_s3_bucket.assets'].attributes).toEqual({
        bucket: 'assets',
        tags: { team: 'platform' },
        arn: 'arn:sim:s3:::assets',
        bucket_domain_name: 'assets.s3.sim.internal',
      });
    });
  });

  describe('destroy', () => {
    it('should remove everything in reverse dependency order', async () => {
      await orchestrator.apply(network, {}, fast);

      expect(summary(await orchestrator.planDestroy())).toEqual([
        'DELETE aws_route.default',
        'DELETE aws_subnet.public',
        'DELETE aws_internet_gateway.gw',
        'DELETE aws_route_table.public',
        'DELETE aws_vpc.main',
      ]);

      const result = await orchestrator.destroy(fast);

      expect(result.complete).toBe(true);
      expect(result.state.resources).toEqual({});
      expect(result.outputs).toEqual({});
      expect(await provider.objects()).toEqual([]);
    });

    it('should do nothing on an empty state', async () => {
      const result = await orchestrator.destroy();

      expect(result.actions).toEqual([]);
      expect(result.complete).toBe(true);
    });
  });
});
