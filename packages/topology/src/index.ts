/**
 * @sr-topology/topology
 * Topology descriptor and resolver for a schema registry test cluster
 */

// Schema types
export type {
  ParameterDefinition,
  ImageTemplate,
  PortMapping,
  NodeGroupDefinition,
  TopologyDescriptor,
  TopologyOverrides,
  FlagValues,
  ResolvedNode,
  NodeAssignment,
  ResolvedTopology,
  ReadinessCheck,
  ReadinessProbe,
  BootstrapAction,
  NodeBootstrapStep,
  BootstrapPhase,
  BootstrapPlan,
  ValidationError,
  ValidationResult,
  RecognizedFlag,
} from './schema.js';

// Errors
export { ConfigurationError, isConfigurationError } from './errors.js';

// Built-in descriptor
export {
  schemaRegistryTopology,
  DEFAULT_CONFLUENT_VERSION,
  DEFAULT_NAMESPACE,
  DEFAULT_NODES,
  REST_PORT,
} from './descriptor.js';

// Naming
export {
  renderTemplate,
  renderImageReference,
  parseImageReference,
  isValidImageReference,
  isValidHostname,
  type ImageReference,
} from './naming.js';

// Parser
export {
  findDescriptorFile,
  parseDescriptor,
  parseDescriptorFromDir,
  validateDescriptor,
} from './parser.js';

// Resolver
export {
  resolve,
  overridesFromFlags,
  getRecognizedFlags,
  findNodeGroup,
  findNode,
  findNodesByGroup,
} from './resolver.js';

// Bootstrap
export {
  createBootstrapPlan,
  generateZookeeperConfig,
  rewriteBrokerId,
  evaluateBrokerRegistration,
  evaluateProbe,
} from './bootstrap.js';

// Compose
export {
  generateCompose,
  formatPort,
  DEFAULT_NETWORK,
  COMPOSE_FILENAME,
  type ComposeOptions,
  type GeneratedFile,
} from './compose.js';

// Host handoff
export { createHostHandoff, type HostHandoff, type HandoffOptions } from './handoff.js';

// =============================================================================
// Convenience Functions
// =============================================================================

import { ConfigurationError } from './errors.js';
import { parseDescriptorFromDir, validateDescriptor } from './parser.js';
import type { TopologyDescriptor } from './schema.js';

/**
 * Load a topology directory and reject descriptors that fail validation
 */
export function loadTopology(dir: string): TopologyDescriptor {
  const descriptor = parseDescriptorFromDir(dir);
  const validation = validateDescriptor(descriptor);

  if (!validation.valid) {
    const first = validation.errors[0];
    throw new ConfigurationError(
      `Invalid topology in ${dir}: ${validation.errors.map(e => `${e.path}: ${e.message}`).join('; ')}`,
      { path: first.path, value: first.value }
    );
  }

  return descriptor;
}
