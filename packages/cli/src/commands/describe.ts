/**
 * sr-topology describe
 *
 * List the flags a topology recognizes and their defaults.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getRecognizedFlags, schemaRegistryTopology } from '@sr-topology/topology';
import type { TopologyDescriptor } from '@sr-topology/topology';

export function createDescribeCommand(
  descriptor: TopologyDescriptor = schemaRegistryTopology
): Command {
  return new Command('describe')
    .description('List recognized flags and their defaults')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const flags = getRecognizedFlags(descriptor);

      if (options.json) {
        console.log(JSON.stringify({ topology: descriptor.name, flags }, null, 2));
        return;
      }

      console.log(chalk.bold(`\n  ${descriptor.name}`));
      if (descriptor.description) {
        console.log(chalk.gray(`  ${descriptor.description}`));
      }
      console.log('');

      const width = Math.max(...flags.map(f => f.flag.length));
      for (const flag of flags) {
        const value = Array.isArray(flag.default) ? flag.default.join(' ') : flag.default;
        console.log(`    ${chalk.cyan(flag.flag.padEnd(width))}  ${flag.description}`);
        console.log(`    ${' '.repeat(width)}  ${chalk.gray(`default: ${value || '(none)'}`)}`);
      }
      console.log('');
    });
}
