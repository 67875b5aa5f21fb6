/**
 * Docker Compose export
 * Renders resolved nodes as a docker-compose.yml for hosts that consume one
 */

import { getComposeServiceName } from './naming.js';
import type { PortMapping, ResolvedNode, ResolvedTopology } from './schema.js';

export const DEFAULT_NETWORK = 'cluster';
export const COMPOSE_FILENAME = 'docker-compose.yml';

export interface ComposeService {
  name: string;
  image: string;
  hostname: string;
  labels: Record<string, string>;
  ports: string[];
  networks: string[];
}

export interface ComposeConfig {
  version: string;
  services: Record<string, ComposeService>;
  networks: Record<string, { driver?: string }>;
}

export interface ComposeOptions {
  network?: string;
  path?: string;
}

export interface GeneratedFile {
  path: string;
  content: string;
}

/**
 * Generate docker-compose.yml for a resolved topology
 */
export function generateCompose(resolved: ResolvedTopology, options: ComposeOptions = {}): GeneratedFile {
  const network = options.network || DEFAULT_NETWORK;
  const services: Record<string, ComposeService> = {};

  for (const node of resolved.nodes) {
    const service = generateNodeService(resolved.name, node, network);
    services[service.name] = service;
  }

  const config: ComposeConfig = {
    version: '3.8',
    services,
    networks: { [network]: { driver: 'bridge' } },
  };

  return {
    path: options.path || COMPOSE_FILENAME,
    content: generateComposeYaml(resolved.name, config),
  };
}

function generateNodeService(topology: string, node: ResolvedNode, network: string): ComposeService {
  return {
    name: getComposeServiceName(node.hostname),
    image: node.image,
    hostname: node.hostname,
    labels: {
      'sr-topology.topology': topology,
      'sr-topology.group': node.group,
      'sr-topology.role': node.role,
    },
    ports: node.ports.map(formatPort),
    networks: [network],
  };
}

export function formatPort(port: PortMapping): string {
  const mapping = port.host ? `${port.host}:${port.container}` : `${port.container}`;
  return port.protocol === 'udp' ? `${mapping}/udp` : mapping;
}

function generateComposeYaml(topology: string, config: ComposeConfig): string {
  const lines: string[] = [
    `# sr-topology nodes for topology "${topology.replace(/[\r\n]+/g, ' ')}"`,
    '# Generated by: sr-topology compose',
    '#',
    '# Usage:',
    '#   docker-compose up -d    Start all nodes',
    '#   docker-compose down     Stop all nodes',
    '',
  ];

  lines.push(`version: '${config.version}'`);
  lines.push('');
  lines.push('services:');

  for (const [name, service] of Object.entries(config.services)) {
    lines.push(`  ${name}:`);
    lines.push(`    image: ${service.image}`);
    lines.push(`    hostname: ${service.hostname}`);

    lines.push('    labels:');
    for (const [key, value] of Object.entries(service.labels)) {
      lines.push(`      ${key}: ${formatYamlString(value)}`);
    }

    if (service.ports.length > 0) {
      lines.push('    ports:');
      for (const port of service.ports) {
        lines.push(`      - "${port}"`);
      }
    }

    lines.push('    networks:');
    for (const network of service.networks) {
      lines.push(`      - ${formatYamlString(network)}`);
    }

    lines.push('');
  }

  lines.push('networks:');
  for (const [name, network] of Object.entries(config.networks)) {
    lines.push(`  ${formatYamlString(name)}:`);
    if (network.driver) {
      lines.push(`    driver: ${network.driver}`);
    }
  }
  lines.push('');

  return lines.join('\n');
}

/**
 * Quote a scalar when plain YAML would misread it
 */
export function formatYamlString(value: string): string {
  const needsQuotes =
    value === '' ||
    value.includes(':') ||
    value.includes('#') ||
    value.includes('\n') ||
    value.includes('\r') ||
    value.includes('"') ||
    value.includes("'") ||
    value.startsWith(' ') ||
    value.endsWith(' ') ||
    /^[-*&!{}[\]@`|>%,?]/.test(value) ||
    /^(true|false|yes|no|on|off|null|~)$/i.test(value) ||
    /^-?\d+(\.\d+)?([eE][+-]?\d+)?$/.test(value);

  if (!needsQuotes) {
    return value;
  }

  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
  return `"${escaped}"`;
}
