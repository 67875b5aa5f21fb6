/**
 * @sr-topology/cli
 *
 * CLI entry point. Exposes the topology's flags to the orchestration host.
 */

import { loadTopology, schemaRegistryTopology } from '@sr-topology/topology';
import { createProgram, findTopologyDir } from './program';
import { handleCommandError } from './options';

async function main(): Promise<void> {
  const dir = findTopologyDir(process.argv.slice(2));
  const descriptor = dir ? loadTopology(dir) : schemaRegistryTopology;

  await createProgram(descriptor).parseAsync();
}

main().catch(error => {
  handleCommandError('cli', error);
});
