/**
 * The document handed to the orchestration host after resolution
 */

import { DEFAULT_NETWORK } from './compose.js';
import type { BootstrapPlan, ResolvedNode, ResolvedTopology } from './schema.js';

export interface HostHandoff {
  topology: string;
  network: string;
  pullImages: boolean;
  parameters: Record<string, string>;
  images: string[];
  nodes: ResolvedNode[];
  bootstrap: BootstrapPlan | null;
}

export interface HandoffOptions {
  network?: string;
  pullImages?: boolean;
}

export function createHostHandoff(
  resolved: ResolvedTopology,
  options: HandoffOptions = {}
): HostHandoff {
  return {
    topology: resolved.name,
    network: options.network || DEFAULT_NETWORK,
    pullImages: options.pullImages ?? false,
    parameters: { ...resolved.parameters },
    images: [...new Set(resolved.nodes.map(n => n.image))],
    nodes: resolved.nodes.map(n => ({ ...n, ports: n.ports.map(p => ({ ...p })) })),
    bootstrap: resolved.bootstrap ?? null,
  };
}
