/**
 * sr-topology validate
 *
 * Check a topology directory's descriptor.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { parseDescriptorFromDir, validateDescriptor } from '@sr-topology/topology';
import { createCommandLogger } from '../logger';
import { handleCommandError } from '../options';

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Validate the descriptor in a topology directory')
    .argument('<dir>', 'Topology directory')
    .option('--json', 'Output as JSON')
    .action((dir: string, options: { json?: boolean }) => {
      const logger = createCommandLogger('validate');

      try {
        const descriptor = parseDescriptorFromDir(dir);
        const result = validateDescriptor(descriptor);
        logger.info(`Validated ${dir}`, result);

        if (!result.valid) {
          process.exitCode = 1;
        }

        if (options.json) {
          console.log(JSON.stringify({ topology: descriptor.name, ...result }, null, 2));
          return;
        }

        if (result.valid) {
          console.log(chalk.green(`\n  ✓ ${descriptor.name} is valid\n`));
          return;
        }

        console.log(chalk.red(`\n  ✗ ${descriptor.name} has ${result.errors.length} error(s)\n`));
        for (const error of result.errors) {
          console.log(`    ${chalk.yellow(error.path)}: ${error.message}`);
        }
        console.log('');
      } catch (error) {
        handleCommandError('validate', error, options.json);
      }
    });
}
