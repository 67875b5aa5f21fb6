import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import {
  findDescriptorFile,
  parseDescriptor,
  parseDescriptorFromDir,
  validateDescriptor,
} from '../parser';
import { schemaRegistryTopology } from '../descriptor';
import { ConfigurationError } from '../errors';
import { loadTopology } from '../index';
import type { TopologyDescriptor } from '../schema';

async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `sr-topology-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

async function writeDescriptor(dir: string, content: unknown, filename = 'topology.json'): Promise<string> {
  const descriptorPath = path.join(dir, filename);
  const text = typeof content === 'string' ? content : JSON.stringify(content, null, 2);
  await fs.writeFile(descriptorPath, text);
  return descriptorPath;
}

function withGroup(overrides: Partial<TopologyDescriptor['nodeGroups'][number]>): TopologyDescriptor {
  return {
    ...schemaRegistryTopology,
    nodeGroups: [{ ...schemaRegistryTopology.nodeGroups[0], ...overrides }],
  };
}

describe('descriptor files', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should find topology.json', async () => {
    const descriptorPath = await writeDescriptor(tempDir, schemaRegistryTopology);

    expect(findDescriptorFile(tempDir)).toBe(descriptorPath);
  });

  it('should fall back to sr-topology.json', async () => {
    const descriptorPath = await writeDescriptor(tempDir, schemaRegistryTopology, 'sr-topology.json');

    expect(findDescriptorFile(tempDir)).toBe(descriptorPath);
  });

  it('should return null when no descriptor exists', () => {
    expect(findDescriptorFile(tempDir)).toBeNull();
  });

  it('should round-trip the built-in descriptor', async () => {
    await writeDescriptor(tempDir, schemaRegistryTopology);

    expect(parseDescriptorFromDir(tempDir)).toEqual(schemaRegistryTopology);
  });

  it('should default descriptions and parameters', async () => {
    await writeDescriptor(tempDir, {
      name: 'minimal',
      nodeGroups: [
        {
          name: 'app',
          flag: 'nodes',
          role: 'app',
          defaultNodes: ['app-1'],
          image: { repository: 'example/app', tag: 'latest' },
        },
      ],
    });

    const descriptor = parseDescriptorFromDir(tempDir);

    expect(descriptor.description).toBe('');
    expect(descriptor.parameters).toEqual([]);
    expect(descriptor.nodeGroups[0].description).toBe('');
  });

  it('should reject a missing file', () => {
    expect(() => parseDescriptor(path.join(tempDir, 'nope.json'))).toThrow(ConfigurationError);
  });

  it('should reject a directory without a descriptor', () => {
    expect(() => parseDescriptorFromDir(tempDir)).toThrow(
      `No descriptor found in ${tempDir}. Expected one of: topology.json, sr-topology.json`
    );
  });

  it('should reject invalid JSON', async () => {
    const descriptorPath = await writeDescriptor(tempDir, '{ "name": ');

    expect(() => parseDescriptor(descriptorPath)).toThrow(/Invalid JSON in descriptor file/);
  });

  it('should reject a descriptor without node groups', async () => {
    const descriptorPath = await writeDescriptor(tempDir, { name: 'empty' });

    expect(() => parseDescriptor(descriptorPath)).toThrow(/nodeGroups: Required/);
  });

  it('should load and validate a topology directory', async () => {
    await writeDescriptor(tempDir, schemaRegistryTopology);

    expect(loadTopology(tempDir).name).toBe('schema-registry');
  });

  it('should refuse to load a topology that fails validation', async () => {
    await writeDescriptor(tempDir, withGroup({ defaultNodes: ['Bad_Name'] }));

    expect(() => loadTopology(tempDir)).toThrow(
      /nodeGroups\[0\]\.defaultNodes\[0\]: node name must be lowercase/
    );
  });
});

describe('validateDescriptor', () => {
  it('should accept the built-in descriptor', () => {
    expect(validateDescriptor(schemaRegistryTopology)).toEqual({ valid: true, errors: [] });
  });

  it('should reject a default that does not match its pattern', () => {
    const descriptor: TopologyDescriptor = {
      ...schemaRegistryTopology,
      parameters: [{ ...schemaRegistryTopology.parameters[0], default: 'latest' }],
    };

    const result = validateDescriptor(descriptor);

    expect(result.valid).toBe(false);
    expect(result.errors).toContainEqual({
      path: 'parameters[0].default',
      message: 'default does not match pattern ^\\d+\\.\\d+\\.\\d+(-[0-9A-Za-z.]+)?$',
      value: 'latest',
    });
  });

  it('should reject a pattern that does not compile', () => {
    const descriptor: TopologyDescriptor = {
      ...schemaRegistryTopology,
      parameters: [{ ...schemaRegistryTopology.parameters[0], pattern: '(' }],
    };

    expect(validateDescriptor(descriptor).errors).toContainEqual({
      path: 'parameters[0].pattern',
      message: 'pattern must be a valid regular expression',
      value: '(',
    });
  });

  it('should reject an image that refers to undeclared parameters', () => {
    const descriptor = withGroup({
      image: { repository: 'confluent/schema-registry', tag: '{kafka-version}' },
    });

    expect(validateDescriptor(descriptor).errors).toContainEqual({
      path: 'nodeGroups[0].image',
      message: 'image references undeclared parameters: kafka-version',
      value: ['kafka-version'],
    });
  });

  it('should reject an image that does not render to a valid reference', () => {
    const descriptor = withGroup({
      image: { repository: 'Confluent/Schema-Registry', tag: '{confluent-version}' },
    });

    const result = validateDescriptor(descriptor);

    expect(result.errors.map(e => e.path)).toEqual(['nodeGroups[0].image']);
    expect(result.errors[0].message).toBe(
      'invalid image reference "Confluent/Schema-Registry:4.0.0"'
    );
  });

  it('should reject an empty default membership', () => {
    const result = validateDescriptor(withGroup({ defaultNodes: [] }));

    expect(result.errors).toContainEqual({
      path: 'nodeGroups[0].defaultNodes',
      message: 'at least one node is required',
    });
  });

  it('should reject a flag shared by a parameter and a node group', () => {
    const result = validateDescriptor(withGroup({ flag: 'namespace' }));

    expect(result.errors).toContainEqual({
      path: 'nodeGroups[0].flag',
      message: 'duplicate flag "namespace" (also defined at parameters[1].flag)',
      value: 'namespace',
    });
  });

  it('should reject a group name that matches another group\'s flag', () => {
    const group = schemaRegistryTopology.nodeGroups[0];
    const descriptor: TopologyDescriptor = {
      ...schemaRegistryTopology,
      nodeGroups: [
        group,
        { ...group, name: 'nodes', flag: 'standby-nodes', defaultNodes: ['standby-1'] },
      ],
    };

    expect(validateDescriptor(descriptor).errors).toEqual([
      {
        path: 'nodeGroups[1].name',
        message: 'duplicate node group key "nodes" (also defined at nodeGroups[0].flag)',
        value: 'nodes',
      },
    ]);
  });

  it('should allow a group whose name and flag are the same', () => {
    const result = validateDescriptor(withGroup({ name: 'nodes', flag: 'nodes' }));

    expect(result).toEqual({ valid: true, errors: [] });
  });

  it('should reject duplicate node names across groups', () => {
    const group = schemaRegistryTopology.nodeGroups[0];
    const descriptor: TopologyDescriptor = {
      ...schemaRegistryTopology,
      nodeGroups: [group, { ...group, name: 'standby', flag: 'standby-nodes' }],
    };

    expect(validateDescriptor(descriptor).errors).toEqual([
      {
        path: 'nodeGroups[1].defaultNodes[0]',
        message: 'duplicate node "registry-1" (also defined at nodeGroups[0].defaultNodes[0])',
        value: 'registry-1',
      },
    ]);
  });
});
