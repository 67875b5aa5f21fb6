import { describe, it, expect } from 'vitest';
import {
  createBootstrapPlan,
  generateZookeeperConfig,
  rewriteBrokerId,
  evaluateBrokerRegistration,
  evaluateProbe,
} from '../bootstrap';
import { resolve } from '../resolver';
import type { ReadinessProbe } from '../schema';

describe('generateZookeeperConfig', () => {
  it('should list every node as an ensemble member', () => {
    const config = generateZookeeperConfig(['registry-1', 'registry-2']);

    expect(config.split('\n')).toEqual([
      'tickTime=2000',
      'dataDir=/zookeeper',
      'clientPort=2181',
      'initLimit=5',
      'syncLimit=2',
      'server.0=registry-1:2888:3888',
      'server.1=registry-2:2888:3888',
    ]);
  });
});

describe('rewriteBrokerId', () => {
  it('should replace the stock broker id', () => {
    const properties = 'log.dirs=/tmp/kafka-logs\nbroker.id=0\nzookeeper.connect=localhost:2181';

    expect(rewriteBrokerId(properties, 2)).toBe(
      'log.dirs=/tmp/kafka-logs\nbroker.id=2\nzookeeper.connect=localhost:2181'
    );
  });

  it('should leave other broker ids alone', () => {
    expect(rewriteBrokerId('broker.id=05', 1)).toBe('broker.id=05');
  });
});

describe('evaluateBrokerRegistration', () => {
  it('should accept a listing with every broker', () => {
    expect(evaluateBrokerRegistration('[0, 1]', 2)).toBe(true);
  });

  it('should read the last line of shell output', () => {
    const output = 'Connecting to localhost:2181\nWATCHER::\n[0, 1, 2]\n';

    expect(evaluateBrokerRegistration(output, 3)).toBe(true);
  });

  it('should reject a partial listing', () => {
    expect(evaluateBrokerRegistration('[0]', 2)).toBe(false);
  });

  it('should reject output that is not a listing', () => {
    expect(evaluateBrokerRegistration('Node does not exist: /brokers/ids', 1)).toBe(false);
  });

  it('should reject a truncated listing', () => {
    expect(evaluateBrokerRegistration('[0,', 1)).toBe(false);
  });
});

describe('evaluateProbe', () => {
  const zookeeper: ReadinessProbe = {
    check: 'zookeeper',
    command: 'ls /',
    intervalSeconds: 3,
    timeoutSeconds: 60,
  };
  const brokers: ReadinessProbe = {
    check: 'broker-registration',
    command: 'ls /brokers/ids',
    intervalSeconds: 3,
    timeoutSeconds: 60,
    expected: 2,
  };

  it('should pass a zookeeper probe on exit code 0', () => {
    expect(evaluateProbe(zookeeper, { exitCode: 0, output: '[zookeeper]' })).toBe(true);
  });

  it('should fail any probe on a non-zero exit code', () => {
    expect(evaluateProbe(zookeeper, { exitCode: 1, output: '' })).toBe(false);
    expect(evaluateProbe(brokers, { exitCode: 1, output: '[0, 1]' })).toBe(false);
  });

  it('should compare broker registrations with the expected count', () => {
    expect(evaluateProbe(brokers, { exitCode: 0, output: '[0, 1]' })).toBe(true);
    expect(evaluateProbe(brokers, { exitCode: 0, output: '[0]' })).toBe(false);
  });
});

describe('createBootstrapPlan', () => {
  const resolved = resolve({ nodeGroups: { nodes: ['registry-1', 'registry-2'] } });
  const plan = createBootstrapPlan(resolved.nodes);
  const phase = (name: string) => plan.phases.find(p => p.name === name);

  it('should give each node its zookeeper id', () => {
    const steps = phase('start-zookeeper')?.steps ?? [];

    expect(steps.map(s => s.hostname)).toEqual(['registry-1', 'registry-2']);
    expect(steps[1].actions).toEqual([
      { type: 'exec', command: 'mkdir -p /zookeeper', detach: false },
      { type: 'write', path: '/zookeeper/myid', content: '1' },
      {
        type: 'write',
        path: '/zookeeper.properties',
        content: generateZookeeperConfig(['registry-1', 'registry-2']),
      },
      { type: 'exec', command: '/start_zookeeper &', detach: true },
    ]);
  });

  it('should probe zookeeper on every node', () => {
    const steps = phase('validate-zookeeper')?.steps ?? [];

    expect(steps).toHaveLength(2);
    expect(steps[0].actions).toEqual([
      {
        type: 'probe',
        probe: {
          check: 'zookeeper',
          command: '/confluent/bin/zookeeper-shell localhost:2181 ls /',
          intervalSeconds: 3,
          timeoutSeconds: 60,
        },
      },
    ]);
  });

  it('should number brokers by node order', () => {
    const steps = phase('start-kafka')?.steps ?? [];

    expect(steps[1].actions[0]).toEqual({
      type: 'rewrite',
      source: '/confluent/etc/kafka/server.properties',
      target: '/kafka.properties',
      find: 'broker.id=0',
      replace: 'broker.id=1',
    });
  });

  it('should check broker registration from the first node only', () => {
    const steps = phase('validate-kafka')?.steps ?? [];

    expect(steps).toHaveLength(1);
    expect(steps[0].hostname).toBe('registry-1');
    expect(steps[0].actions[0]).toMatchObject({
      type: 'probe',
      probe: { check: 'broker-registration', expected: 2 },
    });
  });

  it('should start schema registry last', () => {
    const last = plan.phases[plan.phases.length - 1];

    expect(last.name).toBe('start-schema-registry');
    expect(last.steps.map(s => s.actions)).toEqual([
      [{ type: 'exec', command: '/start_schema_registry &', detach: true }],
      [{ type: 'exec', command: '/start_schema_registry &', detach: true }],
    ]);
  });
});
