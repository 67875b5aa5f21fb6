/**
 * Built-in schema registry topology
 */

import type { TopologyDescriptor } from './schema.js';

export const DEFAULT_CONFLUENT_VERSION = '4.0.0';
export const DEFAULT_NAMESPACE = 'confluent';
export const DEFAULT_NODES = ['registry-1'];

export const REST_PORT = 8081;

export const VERSION_PATTERN = '^\\d+\\.\\d+\\.\\d+(-[0-9A-Za-z.]+)?$';

export const schemaRegistryTopology: TopologyDescriptor = {
  name: 'schema-registry',
  description: 'Schema Registry test cluster',
  parameters: [
    {
      name: 'confluent-version',
      flag: 'confluent-version',
      description: 'Confluent Platform version to use',
      default: DEFAULT_CONFLUENT_VERSION,
      pattern: VERSION_PATTERN,
    },
    {
      name: 'namespace',
      flag: 'namespace',
      description: 'Image repository namespace',
      default: DEFAULT_NAMESPACE,
      pattern: '^[a-z0-9]+(?:[._-][a-z0-9]+)*$',
    },
    {
      name: 'registry',
      flag: 'registry',
      description: 'Image registry host (omit for the default registry)',
      default: '',
      pattern: '^$|^[a-zA-Z0-9.-]+(:\\d+)?$',
    },
  ],
  nodeGroups: [
    {
      name: 'registry',
      flag: 'nodes',
      description: 'Nodes of the Schema Registry group',
      role: 'registry',
      defaultNodes: DEFAULT_NODES,
      image: {
        registry: '{registry}',
        repository: '{namespace}/schema-registry',
        tag: '{confluent-version}',
      },
      ports: [{ container: REST_PORT, protocol: 'tcp' }],
    },
  ],
  bootstrap: true,
};
