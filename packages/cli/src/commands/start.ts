/**
 * sr-topology start
 *
 * Resolve the topology and hand the node assignments to the host.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  createHostHandoff,
  overridesFromFlags,
  resolve,
  schemaRegistryTopology,
} from '@sr-topology/topology';
import type { HostHandoff, TopologyDescriptor } from '@sr-topology/topology';
import { createCommandLogger } from '../logger';
import {
  addHostOptions,
  addTopologyOptions,
  collectFlags,
  getHostOptions,
  handleCommandError,
} from '../options';

export function createStartCommand(descriptor: TopologyDescriptor = schemaRegistryTopology): Command {
  const command = new Command('start').description(
    `Start a ${descriptor.description || descriptor.name} (resolves nodes and images for the host)`
  );

  addTopologyOptions(command, descriptor);
  addHostOptions(command)
    .option('--json', 'Output the host handoff as JSON')
    .option('--verbose', 'Show the bootstrap plan')
    .action((_options: unknown, cmd: Command) => {
      const logger = createCommandLogger('start', descriptor.name);
      const host = getHostOptions(cmd);

      try {
        const flags = collectFlags(cmd, descriptor);
        logger.info('Resolving topology', { topology: descriptor.name, flags });

        const resolved = resolve(overridesFromFlags(flags, descriptor), descriptor);
        const handoff = createHostHandoff(resolved, {
          network: host.network,
          pullImages: host.alwaysPull,
        });
        logger.resolved(resolved);

        if (host.json) {
          console.log(JSON.stringify(handoff, null, 2));
          return;
        }

        printHandoff(handoff, host.verbose);
      } catch (error) {
        handleCommandError('start', error, host.json);
      }
    });

  return command;
}

function printHandoff(handoff: HostHandoff, verbose: boolean): void {
  console.log(chalk.bold(`\n  Topology ${handoff.topology}\n`));

  const parameters = Object.entries(handoff.parameters);
  const keyWidth = Math.max(...parameters.map(([key]) => key.length));
  console.log(chalk.gray('  Parameters'));
  for (const [key, value] of parameters) {
    console.log(`    ${key.padEnd(keyWidth)}  ${value ? chalk.white(value) : chalk.gray('(none)')}`);
  }
  console.log('');

  const nameWidth = Math.max(...handoff.nodes.map(n => n.hostname.length));
  console.log(chalk.gray('  Nodes'));
  for (const node of handoff.nodes) {
    console.log(
      `    ${node.hostname.padEnd(nameWidth)}  ${chalk.cyan(node.image)}  ${chalk.gray(`(${node.role})`)}`
    );
  }
  console.log('');

  console.log(`  Network:     ${chalk.white(handoff.network)}`);
  console.log(`  Pull images: ${handoff.pullImages ? chalk.white('always') : chalk.gray('if missing')}`);
  console.log('');

  if (verbose && handoff.bootstrap) {
    console.log(chalk.gray('  Bootstrap'));
    for (const phase of handoff.bootstrap.phases) {
      const hosts = phase.steps.map(s => s.hostname).join(', ');
      console.log(`    ${phase.name.padEnd(22)} ${phase.description} ${chalk.gray(`[${hosts}]`)}`);
    }
    console.log('');
  }
}
