/**
 * Command-line options declared by a topology descriptor
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { ConfigurationError, DEFAULT_NETWORK, isConfigurationError } from '@sr-topology/topology';
import type { FlagValues, TopologyDescriptor } from '@sr-topology/topology';
import { logFullError } from './logger';

/** Flags owned by the CLI itself; descriptors may not declare them */
export const RESERVED_FLAGS = ['network', 'always-pull', 'json', 'verbose', 'output', 'topology', 'help', 'version'];

export interface HostOptions {
  network: string;
  alwaysPull: boolean;
  json: boolean;
  verbose: boolean;
}

/**
 * Declare one option per parameter and node group
 */
export function addTopologyOptions(command: Command, descriptor: TopologyDescriptor): Command {
  const flags = [...descriptor.parameters.map(p => p.flag), ...descriptor.nodeGroups.map(g => g.flag)];
  const reserved = flags.find(flag => RESERVED_FLAGS.includes(flag));
  if (reserved) {
    throw new ConfigurationError(`topology "${descriptor.name}" declares reserved flag --${reserved}`, {
      value: reserved,
    });
  }

  for (const parameter of descriptor.parameters) {
    const option = new Option(`--${parameter.flag} <value>`, parameter.description);
    if (parameter.default !== '') {
      option.default(parameter.default);
    }
    command.addOption(option);
  }

  for (const group of descriptor.nodeGroups) {
    command.addOption(
      new Option(`--${group.flag} <nodes...>`, group.description).default([...group.defaultNodes])
    );
  }

  return command;
}

/**
 * Declare the options forwarded to the orchestration host
 */
export function addHostOptions(command: Command): Command {
  return command
    .option('--network <network>', 'Network to attach the nodes to', DEFAULT_NETWORK)
    .option('--always-pull', 'Pull images even when they exist locally', false);
}

/**
 * Read topology option values back, keyed by flag
 */
export function collectFlags(command: Command, descriptor: TopologyDescriptor): FlagValues {
  const values = command.opts();
  const flags: FlagValues = {};

  const declared = [...descriptor.parameters.map(p => p.flag), ...descriptor.nodeGroups.map(g => g.flag)];
  for (const flag of declared) {
    const option = command.options.find(o => o.long === `--${flag}`);
    if (!option) continue;

    const value: unknown = values[option.attributeName()];
    if (typeof value === 'string') {
      flags[flag] = value;
    } else if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
      flags[flag] = value;
    }
  }

  return flags;
}

export function getHostOptions(command: Command): HostOptions {
  const values = command.opts();
  return {
    network: typeof values.network === 'string' ? values.network : DEFAULT_NETWORK,
    alwaysPull: values.alwaysPull === true,
    json: values.json === true,
    verbose: values.verbose === true,
  };
}

/**
 * Report a failed command. Configuration errors are fatal: exit code 1.
 */
export function handleCommandError(context: string, error: unknown, json = false): void {
  logFullError(context, error);
  process.exitCode = 1;

  const message = error instanceof Error ? error.message : String(error);

  if (json) {
    const path = isConfigurationError(error) ? error.path : undefined;
    console.log(JSON.stringify({ error: message, ...(path ? { path } : {}) }, null, 2));
    return;
  }

  console.log(chalk.red(`\n  Error: ${message}\n`));
  if (isConfigurationError(error)) {
    console.log(chalk.gray('  Run `sr-topology describe` to see recognized flags.\n'));
  }
}
