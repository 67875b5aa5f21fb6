/**
 * sr-topology descriptor parser
 * Reads and validates topology.json from a topology directory
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { getTemplateParameters, isValidHostname, renderImageReference } from './naming.js';
import type {
  NodeGroupDefinition,
  ParameterDefinition,
  TopologyDescriptor,
  ValidationError,
  ValidationResult,
} from './schema.js';

const DESCRIPTOR_FILENAMES = ['topology.json', 'sr-topology.json'];

const namePattern = /^[a-z][a-z0-9-]*$/;

const parameterSchema = z.object({
  name: z.string().regex(namePattern),
  flag: z.string().regex(namePattern),
  description: z.string().default(''),
  default: z.string(),
  pattern: z.string().optional(),
});

const portSchema = z.object({
  container: z.number().int().min(1).max(65535),
  host: z.number().int().min(1).max(65535).optional(),
  protocol: z.enum(['tcp', 'udp']).optional(),
});

const nodeGroupSchema = z.object({
  name: z.string().regex(namePattern),
  flag: z.string().regex(namePattern),
  description: z.string().default(''),
  role: z.string().min(1),
  defaultNodes: z.array(z.string()).min(1),
  image: z.object({
    registry: z.string().optional(),
    repository: z.string().min(1),
    tag: z.string().min(1),
  }),
  ports: z.array(portSchema).optional(),
});

const descriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  parameters: z.array(parameterSchema).default([]),
  nodeGroups: z.array(nodeGroupSchema).min(1),
  bootstrap: z.boolean().optional(),
});

/**
 * Find the descriptor file in the given directory
 */
export function findDescriptorFile(dir: string): string | null {
  for (const filename of DESCRIPTOR_FILENAMES) {
    const filepath = resolve(dir, filename);
    if (existsSync(filepath)) {
      return filepath;
    }
  }
  return null;
}

/**
 * Parse a descriptor file. Checks shape only; see validateDescriptor.
 */
export function parseDescriptor(descriptorPath: string): TopologyDescriptor {
  if (!existsSync(descriptorPath)) {
    throw new ConfigurationError(`Descriptor file not found: ${descriptorPath}`);
  }

  const content = readFileSync(descriptorPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid JSON in descriptor file: ${message}`);
  }

  const result = descriptorSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.');
    throw new ConfigurationError(`Invalid descriptor ${descriptorPath}: ${path}: ${issue.message}`, {
      path,
    });
  }

  return result.data;
}

/**
 * Parse a descriptor from a topology directory (auto-discovers the file)
 */
export function parseDescriptorFromDir(dir: string): TopologyDescriptor {
  const descriptorPath = findDescriptorFile(dir);
  if (!descriptorPath) {
    throw new ConfigurationError(
      `No descriptor found in ${dir}. Expected one of: ${DESCRIPTOR_FILENAMES.join(', ')}`
    );
  }
  return parseDescriptor(descriptorPath);
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a descriptor's semantics
 */
export function validateDescriptor(descriptor: TopologyDescriptor): ValidationResult {
  const errors: ValidationError[] = [];

  descriptor.parameters.forEach((parameter, i) => {
    validateParameter(parameter, `parameters[${i}]`, errors);
  });

  if (descriptor.nodeGroups.length === 0) {
    errors.push({ path: 'nodeGroups', message: 'at least one node group is required' });
  }

  descriptor.nodeGroups.forEach((group, i) => {
    validateNodeGroup(group, descriptor.parameters, `nodeGroups[${i}]`, errors);
  });

  checkDuplicateNames(descriptor, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

function validateParameter(
  parameter: ParameterDefinition,
  path: string,
  errors: ValidationError[]
): void {
  if (parameter.pattern === undefined) return;

  let pattern: RegExp;
  try {
    pattern = new RegExp(parameter.pattern);
  } catch {
    errors.push({
      path: `${path}.pattern`,
      message: 'pattern must be a valid regular expression',
      value: parameter.pattern,
    });
    return;
  }

  if (!pattern.test(parameter.default)) {
    errors.push({
      path: `${path}.default`,
      message: `default does not match pattern ${parameter.pattern}`,
      value: parameter.default,
    });
  }
}

function validateNodeGroup(
  group: NodeGroupDefinition,
  parameters: ParameterDefinition[],
  path: string,
  errors: ValidationError[]
): void {
  if (group.defaultNodes.length === 0) {
    errors.push({ path: `${path}.defaultNodes`, message: 'at least one node is required' });
  }

  group.defaultNodes.forEach((hostname, i) => {
    if (!isValidHostname(hostname)) {
      errors.push({
        path: `${path}.defaultNodes[${i}]`,
        message: 'node name must be lowercase alphanumeric with hyphens, 1-63 chars',
        value: hostname,
      });
    }
  });

  const declared = new Set(parameters.map(p => p.name));
  const templates = [group.image.registry ?? '', group.image.repository, group.image.tag];
  const unknown = templates.flatMap(getTemplateParameters).filter(name => !declared.has(name));

  if (unknown.length > 0) {
    errors.push({
      path: `${path}.image`,
      message: `image references undeclared parameters: ${unknown.join(', ')}`,
      value: unknown,
    });
    return;
  }

  const defaults = Object.fromEntries(parameters.map(p => [p.name, p.default]));
  try {
    renderImageReference(group.image, defaults);
  } catch (err) {
    errors.push({
      path: `${path}.image`,
      message: err instanceof Error ? err.message : String(err),
      value: group.image,
    });
  }
}

function checkDuplicateNames(descriptor: TopologyDescriptor, errors: ValidationError[]): void {
  const check = (seen: Map<string, string>, label: string, key: string, path: string) => {
    const previous = seen.get(key);
    if (previous !== undefined) {
      errors.push({
        path,
        message: `duplicate ${label} "${key}" (also defined at ${previous})`,
        value: key,
      });
    } else {
      seen.set(key, path);
    }
  };

  const parameterNames = new Map<string, string>();
  const flags = new Map<string, string>();
  const hostnames = new Map<string, string>();
  // Overrides address a group by name or flag, so both share one key space
  const groupKeys = new Map<string, string>();

  descriptor.parameters.forEach((p, i) => {
    check(parameterNames, 'parameter', p.name, `parameters[${i}].name`);
    check(flags, 'flag', p.flag, `parameters[${i}].flag`);
  });

  descriptor.nodeGroups.forEach((g, i) => {
    check(groupKeys, 'node group key', g.name, `nodeGroups[${i}].name`);
    if (g.flag !== g.name) {
      check(groupKeys, 'node group key', g.flag, `nodeGroups[${i}].flag`);
    }
    check(flags, 'flag', g.flag, `nodeGroups[${i}].flag`);
    g.defaultNodes.forEach((hostname, j) => {
      check(hostnames, 'node', hostname, `nodeGroups[${i}].defaultNodes[${j}]`);
    });
  });
}
