/**
 * CLI program setup
 */

import { Command } from 'commander';
import { schemaRegistryTopology } from '@sr-topology/topology';
import type { TopologyDescriptor } from '@sr-topology/topology';
import {
  createComposeCommand,
  createDescribeCommand,
  createStartCommand,
  createValidateCommand,
} from './commands';

export const CLI_VERSION = '0.1.0';

export function createProgram(descriptor: TopologyDescriptor = schemaRegistryTopology): Command {
  const program = new Command();

  program
    .name('sr-topology')
    .description('Topology descriptor for a Schema Registry test cluster')
    .version(CLI_VERSION)
    .option('--topology <dir>', 'Load the topology from a directory instead of the built-in one');

  // Topology commands
  program.addCommand(createStartCommand(descriptor));
  program.addCommand(createComposeCommand(descriptor));
  program.addCommand(createDescribeCommand(descriptor));

  // Descriptor commands
  program.addCommand(createValidateCommand());

  return program;
}

/**
 * Options depend on the descriptor, so --topology is read before commander parses
 */
export function findTopologyDir(args: readonly string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--topology' && i + 1 < args.length) {
      return args[i + 1];
    }
    if (arg.startsWith('--topology=')) {
      return arg.slice('--topology='.length);
    }
  }
  return undefined;
}
