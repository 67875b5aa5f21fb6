/**
 * sr-topology schema
 * TypeScript interfaces for topology descriptors and their resolved form
 */

// =============================================================================
// Descriptor
// =============================================================================

/**
 * A user-overridable value, exposed to the host as a command-line flag.
 */
export interface ParameterDefinition {
  name: string;
  flag: string;
  description: string;
  default: string;
  /** Regular expression the resolved value must match */
  pattern?: string;
}

/**
 * Image reference template. Each part may contain `{parameter}` placeholders.
 * An empty rendered registry is dropped from the reference.
 */
export interface ImageTemplate {
  registry?: string;
  repository: string;
  tag: string;
}

export interface PortMapping {
  container: number;
  host?: number;
  protocol?: 'tcp' | 'udp';
}

export interface NodeGroupDefinition {
  name: string;
  flag: string;
  description: string;
  role: string;
  defaultNodes: string[];
  image: ImageTemplate;
  ports?: PortMapping[];
}

export interface TopologyDescriptor {
  name: string;
  description: string;
  parameters: ParameterDefinition[];
  nodeGroups: NodeGroupDefinition[];
  /** Attach the ZooKeeper/Kafka/Schema Registry bootstrap plan */
  bootstrap?: boolean;
}

// =============================================================================
// Overrides
// =============================================================================

export interface TopologyOverrides {
  parameters?: Record<string, string>;
  /** Keyed by node group name or by its flag */
  nodeGroups?: Record<string, string[]>;
}

/**
 * Flat form of overrides, as collected from command-line flags
 */
export type FlagValues = Record<string, string | string[] | undefined>;

// =============================================================================
// Resolved
// =============================================================================

export interface ResolvedNode {
  hostname: string;
  image: string;
  group: string;
  role: string;
  ports: PortMapping[];
}

export interface NodeAssignment {
  image: string;
  role: string;
}

export interface ResolvedTopology {
  name: string;
  parameters: Readonly<Record<string, string>>;
  nodes: readonly ResolvedNode[];
  assignments: Readonly<Record<string, NodeAssignment>>;
  bootstrap?: BootstrapPlan;
}

// =============================================================================
// Bootstrap Plan
// =============================================================================

export type ReadinessCheck = 'zookeeper' | 'broker-registration';

export interface ReadinessProbe {
  check: ReadinessCheck;
  command: string;
  intervalSeconds: number;
  timeoutSeconds: number;
  /** Broker count expected in the registration listing */
  expected?: number;
}

/**
 * Something the host does inside a running node, in order
 */
export type BootstrapAction =
  | { type: 'exec'; command: string; detach: boolean }
  | { type: 'write'; path: string; content: string }
  | { type: 'rewrite'; source: string; target: string; find: string; replace: string }
  | { type: 'probe'; probe: ReadinessProbe };

export interface NodeBootstrapStep {
  hostname: string;
  actions: BootstrapAction[];
}

export interface BootstrapPhase {
  name: string;
  description: string;
  steps: NodeBootstrapStep[];
}

export interface BootstrapPlan {
  phases: BootstrapPhase[];
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface RecognizedFlag {
  flag: string;
  kind: 'parameter' | 'node-group';
  target: string;
  description: string;
  default: string | string[];
}
