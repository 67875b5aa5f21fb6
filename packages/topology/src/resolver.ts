/**
 * sr-topology resolver
 * Merges user overrides over descriptor defaults into node assignments
 */

import { createBootstrapPlan } from './bootstrap.js';
import { schemaRegistryTopology } from './descriptor.js';
import { ConfigurationError } from './errors.js';
import { isValidHostname, renderImageReference } from './naming.js';
import type {
  FlagValues,
  NodeAssignment,
  NodeGroupDefinition,
  ParameterDefinition,
  RecognizedFlag,
  ResolvedNode,
  ResolvedTopology,
  TopologyDescriptor,
  TopologyOverrides,
} from './schema.js';

/**
 * Resolve a topology into its node assignments.
 * Pure: the same overrides always produce the same result.
 */
export function resolve(
  overrides: TopologyOverrides = {},
  descriptor: TopologyDescriptor = schemaRegistryTopology
): ResolvedTopology {
  const parameters = resolveParameters(descriptor.parameters, overrides.parameters ?? {});
  const membership = resolveMembership(descriptor, overrides.nodeGroups ?? {});

  const nodes: ResolvedNode[] = [];
  const assignments: Record<string, NodeAssignment> = {};
  const seen = new Map<string, string>(); // hostname -> group

  for (const group of descriptor.nodeGroups) {
    const image = renderImageReference(group.image, parameters, `nodeGroups.${group.name}.image`);
    const members = membership.get(group.name) ?? group.defaultNodes;

    members.forEach((hostname, i) => {
      const path = `nodeGroups.${group.name}[${i}]`;

      if (!isValidHostname(hostname)) {
        throw new ConfigurationError(
          `invalid node name "${hostname}": must be lowercase alphanumeric with hyphens, 1-63 chars`,
          { path, value: hostname }
        );
      }

      const owner = seen.get(hostname);
      if (owner !== undefined) {
        throw new ConfigurationError(
          `duplicate node name "${hostname}" (also in node group "${owner}")`,
          { path, value: hostname }
        );
      }
      seen.set(hostname, group.name);

      nodes.push({
        hostname,
        image,
        group: group.name,
        role: group.role,
        ports: (group.ports ?? []).map(port => ({ ...port })),
      });
      assignments[hostname] = { image, role: group.role };
    });
  }

  return {
    name: descriptor.name,
    parameters: Object.freeze(parameters),
    nodes: Object.freeze(nodes),
    assignments: Object.freeze(assignments),
    ...(descriptor.bootstrap ? { bootstrap: createBootstrapPlan(nodes) } : {}),
  };
}

/**
 * Split flat flag values (keyed by flag name, without dashes) into
 * parameter and node group overrides. Node list entries may be
 * comma-separated.
 */
export function overridesFromFlags(
  flags: FlagValues,
  descriptor: TopologyDescriptor = schemaRegistryTopology
): TopologyOverrides {
  const parameters: Record<string, string> = {};
  const nodeGroups: Record<string, string[]> = {};

  for (const [key, value] of Object.entries(flags)) {
    if (value === undefined) continue;

    const parameter = descriptor.parameters.find(p => p.flag === key);
    if (parameter) {
      if (Array.isArray(value)) {
        throw new ConfigurationError(`flag --${parameter.flag} takes a single value`, {
          path: `parameters.${parameter.name}`,
          value,
        });
      }
      parameters[parameter.name] = value;
      continue;
    }

    const group = descriptor.nodeGroups.find(g => g.flag === key);
    if (group) {
      nodeGroups[group.name] = Array.isArray(value) ? value.flatMap(splitList) : splitList(value);
      continue;
    }

    throw new ConfigurationError(`unknown flag "--${key}" for topology "${descriptor.name}"`, {
      path: key,
      value,
    });
  }

  return { parameters, nodeGroups };
}

/**
 * Flags the host exposes for a descriptor, with their defaults
 */
export function getRecognizedFlags(
  descriptor: TopologyDescriptor = schemaRegistryTopology
): RecognizedFlag[] {
  return [
    ...descriptor.parameters.map(p => ({
      flag: `--${p.flag}`,
      kind: 'parameter' as const,
      target: p.name,
      description: p.description,
      default: p.default,
    })),
    ...descriptor.nodeGroups.map(g => ({
      flag: `--${g.flag}`,
      kind: 'node-group' as const,
      target: g.name,
      description: g.description,
      default: [...g.defaultNodes],
    })),
  ];
}

// =============================================================================
// Lookups
// =============================================================================

export function findNodeGroup(
  descriptor: TopologyDescriptor,
  key: string
): NodeGroupDefinition | undefined {
  return descriptor.nodeGroups.find(g => g.name === key || g.flag === key);
}

export function findNode(resolved: ResolvedTopology, hostname: string): ResolvedNode | undefined {
  return resolved.nodes.find(n => n.hostname === hostname);
}

export function findNodesByGroup(resolved: ResolvedTopology, group: string): ResolvedNode[] {
  return resolved.nodes.filter(n => n.group === group);
}

// =============================================================================
// Merging
// =============================================================================

function resolveParameters(
  definitions: ParameterDefinition[],
  overrides: Record<string, string>
): Record<string, string> {
  for (const name of Object.keys(overrides)) {
    if (!definitions.some(p => p.name === name)) {
      throw new ConfigurationError(`unknown parameter "${name}"`, {
        path: `parameters.${name}`,
        value: overrides[name],
      });
    }
  }

  const resolved: Record<string, string> = {};
  for (const definition of definitions) {
    const override = Object.hasOwn(overrides, definition.name) ? overrides[definition.name] : undefined;
    const value = override ?? definition.default;

    if (definition.pattern && !compilePattern(definition).test(value)) {
      throw new ConfigurationError(
        `invalid value "${value}" for parameter "${definition.name}" (expected ${definition.pattern})`,
        { path: `parameters.${definition.name}`, value }
      );
    }

    resolved[definition.name] = value;
  }

  return resolved;
}

function resolveMembership(
  descriptor: TopologyDescriptor,
  overrides: Record<string, string[]>
): Map<string, string[]> {
  const membership = new Map<string, string[]>();

  for (const [key, members] of Object.entries(overrides)) {
    const group = findNodeGroup(descriptor, key);
    if (!group) {
      throw new ConfigurationError(`unknown node group "${key}"`, {
        path: `nodeGroups.${key}`,
        value: members,
      });
    }

    if (membership.has(group.name)) {
      throw new ConfigurationError(`node group "${group.name}" is overridden more than once`, {
        path: `nodeGroups.${key}`,
        value: members,
      });
    }

    if (members.length === 0) {
      throw new ConfigurationError(`node group "${group.name}" must have at least one node`, {
        path: `nodeGroups.${key}`,
        value: members,
      });
    }

    membership.set(group.name, [...members]);
  }

  return membership;
}

function compilePattern(definition: ParameterDefinition): RegExp {
  try {
    return new RegExp(definition.pattern ?? '');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(
      `invalid pattern for parameter "${definition.name}": ${reason}`,
      { path: `parameters.${definition.name}.pattern`, value: definition.pattern }
    );
  }
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
