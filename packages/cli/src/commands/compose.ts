/**
 * sr-topology compose
 *
 * Write a docker-compose.yml for the resolved nodes.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  COMPOSE_FILENAME,
  generateCompose,
  overridesFromFlags,
  resolve,
  schemaRegistryTopology,
} from '@sr-topology/topology';
import type { TopologyDescriptor } from '@sr-topology/topology';
import { createCommandLogger } from '../logger';
import {
  addHostOptions,
  addTopologyOptions,
  collectFlags,
  getHostOptions,
  handleCommandError,
} from '../options';

export function createComposeCommand(
  descriptor: TopologyDescriptor = schemaRegistryTopology
): Command {
  const command = new Command('compose').description(
    'Write a docker-compose.yml for the resolved nodes'
  );

  addTopologyOptions(command, descriptor);
  addHostOptions(command)
    .option('-o, --output <file>', 'Output file', COMPOSE_FILENAME)
    .action(async (options: { output: string }, cmd: Command) => {
      const logger = createCommandLogger('compose', descriptor.name);
      const host = getHostOptions(cmd);

      try {
        const resolved = resolve(overridesFromFlags(collectFlags(cmd, descriptor), descriptor), descriptor);
        const file = generateCompose(resolved, { network: host.network, path: options.output });
        const target = path.resolve(process.cwd(), file.path);

        const spinner = ora(`Writing ${file.path}...`).start();
        try {
          await fs.mkdir(path.dirname(target), { recursive: true });
          await fs.writeFile(target, file.content);
        } catch (error) {
          spinner.fail(`Could not write ${file.path}`);
          throw error;
        }
        spinner.succeed(`Wrote ${file.path}`);
        logger.resolved(resolved);
        logger.info(`Wrote ${target}`);

        console.log(chalk.gray(`\n  ${resolved.nodes.length} node(s). Start with: docker-compose -f ${file.path} up -d\n`));
      } catch (error) {
        handleCommandError('compose', error);
      }
    });

  return command;
}
