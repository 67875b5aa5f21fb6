/**
 * Bootstrap plan for the schema registry cluster.
 *
 * Every node runs a ZooKeeper ensemble member, a Kafka broker and a
 * Schema Registry instance. The plan is data: the host executes it.
 */

import type {
  BootstrapAction,
  BootstrapPlan,
  NodeBootstrapStep,
  ReadinessProbe,
  ResolvedNode,
} from './schema.js';

export const ZOOKEEPER_CLIENT_PORT = 2181;
export const ZOOKEEPER_PEER_PORT = 2888;
export const ZOOKEEPER_ELECTION_PORT = 3888;
export const ZOOKEEPER_DATA_DIR = '/zookeeper';

export const KAFKA_SOURCE_PROPERTIES = '/confluent/etc/kafka/server.properties';
export const KAFKA_PROPERTIES = '/kafka.properties';

export const PROBE_INTERVAL_SECONDS = 3;
export const PROBE_TIMEOUT_SECONDS = 60;

const ZOOKEEPER_SHELL = `/confluent/bin/zookeeper-shell localhost:${ZOOKEEPER_CLIENT_PORT}`;

const ZOOKEEPER_SETTINGS = [
  'tickTime=2000',
  `dataDir=${ZOOKEEPER_DATA_DIR}`,
  `clientPort=${ZOOKEEPER_CLIENT_PORT}`,
  'initLimit=5',
  'syncLimit=2',
];

/**
 * Build the bootstrap plan for a set of resolved nodes.
 * Node order fixes ZooKeeper ids and broker ids.
 */
export function createBootstrapPlan(nodes: readonly ResolvedNode[]): BootstrapPlan {
  const hostnames = nodes.map(n => n.hostname);
  const zookeeperConfig = generateZookeeperConfig(hostnames);

  return {
    phases: [
      {
        name: 'start-zookeeper',
        description: 'Start ZooKeeper on every node',
        steps: hostnames.map((hostname, idx) =>
          step(hostname, [
            { type: 'exec', command: `mkdir -p ${ZOOKEEPER_DATA_DIR}`, detach: false },
            { type: 'write', path: `${ZOOKEEPER_DATA_DIR}/myid`, content: String(idx) },
            { type: 'write', path: '/zookeeper.properties', content: zookeeperConfig },
            { type: 'exec', command: '/start_zookeeper &', detach: true },
          ])
        ),
      },
      {
        name: 'validate-zookeeper',
        description: 'Wait for ZooKeeper to answer on every node',
        steps: hostnames.map(hostname =>
          step(hostname, [{ type: 'probe', probe: zookeeperProbe() }])
        ),
      },
      {
        name: 'start-kafka',
        description: 'Start a Kafka broker on every node',
        steps: hostnames.map((hostname, idx) =>
          step(hostname, [
            {
              type: 'rewrite',
              source: KAFKA_SOURCE_PROPERTIES,
              target: KAFKA_PROPERTIES,
              find: 'broker.id=0',
              replace: `broker.id=${idx}`,
            },
            { type: 'exec', command: '/start_kafka &', detach: true },
          ])
        ),
      },
      {
        name: 'validate-kafka',
        description: 'Wait for all brokers to register in ZooKeeper',
        steps: hostnames.slice(0, 1).map(hostname =>
          step(hostname, [{ type: 'probe', probe: brokerRegistrationProbe(hostnames.length) }])
        ),
      },
      {
        name: 'start-schema-registry',
        description: 'Start Schema Registry on every node',
        steps: hostnames.map(hostname =>
          step(hostname, [{ type: 'exec', command: '/start_schema_registry &', detach: true }])
        ),
      },
    ],
  };
}

/**
 * ZooKeeper ensemble configuration shared by all nodes
 */
export function generateZookeeperConfig(hostnames: readonly string[]): string {
  const servers = hostnames.map(
    (hostname, idx) =>
      `server.${idx}=${hostname}:${ZOOKEEPER_PEER_PORT}:${ZOOKEEPER_ELECTION_PORT}`
  );
  return [...ZOOKEEPER_SETTINGS, ...servers].join('\n');
}

/**
 * Give a broker its id in the stock server.properties
 */
export function rewriteBrokerId(properties: string, brokerId: number): string {
  return properties.replace(/^broker\.id=0$/gm, `broker.id=${brokerId}`);
}

/**
 * Check the broker listing printed by `ls /brokers/ids`.
 * The last line must be a JSON array holding every broker.
 */
export function evaluateBrokerRegistration(output: string, expectedCount: number): boolean {
  const lines = output.trim().split('\n');
  const listing = lines[lines.length - 1].trim();

  if (!listing.startsWith('[')) {
    return false;
  }

  let ids: unknown;
  try {
    ids = JSON.parse(listing);
  } catch {
    return false;
  }

  return Array.isArray(ids) && ids.length === expectedCount;
}

/**
 * Interpret the result of running a probe command
 */
export function evaluateProbe(
  probe: ReadinessProbe,
  result: { exitCode: number; output: string }
): boolean {
  if (result.exitCode !== 0) {
    return false;
  }

  switch (probe.check) {
    case 'zookeeper':
      return true;
    case 'broker-registration':
      return evaluateBrokerRegistration(result.output, probe.expected ?? 0);
  }
}

function zookeeperProbe(): ReadinessProbe {
  return {
    check: 'zookeeper',
    command: `${ZOOKEEPER_SHELL} ls /`,
    intervalSeconds: PROBE_INTERVAL_SECONDS,
    timeoutSeconds: PROBE_TIMEOUT_SECONDS,
  };
}

function brokerRegistrationProbe(brokerCount: number): ReadinessProbe {
  return {
    check: 'broker-registration',
    command: `${ZOOKEEPER_SHELL} <<< "ls /brokers/ids" | tail -n 1`,
    intervalSeconds: PROBE_INTERVAL_SECONDS,
    timeoutSeconds: PROBE_TIMEOUT_SECONDS,
    expected: brokerCount,
  };
}

function step(hostname: string, actions: BootstrapAction[]): NodeBootstrapStep {
  return { hostname, actions };
}
