/**
 * Core type definitions for the VM power scheduler.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Scaling directions understood by the scheduler.
 */
export type ScaleIntent = 'scale_up' | 'scale_down';

/**
 * Power state of a Compute Engine instance, as seen at discovery time.
 * Control-plane statuses without a dedicated member collapse to OTHER.
 */
export type InstanceState =
  | 'RUNNING'
  | 'STOPPED'
  | 'TERMINATED'
  | 'SUSPENDED'
  | 'SUSPENDING'
  | 'STOPPING'
  | 'PROVISIONING'
  | 'OTHER';

/**
 * A single label requirement. Matching is exact and case-sensitive.
 */
export interface LabelRequirement {
  key: string;
  value: string;
}

/**
 * Conjunction of label requirements used to pick instances.
 */
export type LabelSelector = readonly LabelRequirement[];

/**
 * Snapshot of a discovered instance. May be stale by the time an action runs;
 * the control plane stays authoritative.
 */
export interface InstanceRef {
  readonly name: string;
  readonly zone: string;
  readonly state: InstanceState;
}

/**
 * Control-plane power operations.
 */
export type PowerOperation = 'start' | 'stop' | 'suspend' | 'resume';

/**
 * Which operation each scaling direction uses.
 */
export interface ScaleConfig {
  scaleDownOperation: 'STOP' | 'SUSPEND';
  scaleUpOperation: 'START' | 'RESUME';
}

/**
 * How per-instance actions are dispatched.
 *
 * - sequential: one instance at a time, in discovery order (default)
 * - parallel: all instances at once; outcome order is not part of the contract
 */
export type ExecutionStrategy = 'sequential' | 'parallel';

/**
 * Process-wide scheduler configuration, resolved once per invocation.
 */
export interface SchedulerConfig {
  readonly defaultProjectId?: string;
  readonly defaultSelector: LabelSelector;
  readonly defaultZones: readonly string[];
  readonly scale: ScaleConfig;
  readonly executionStrategy: ExecutionStrategy;
}

/**
 * ActionPolicy verdict for one instance.
 */
export type Decision =
  | { kind: 'skip'; reason: string }
  | { kind: 'perform'; operation: PowerOperation }
  | { kind: 'unknown'; message: string };

export type OutcomeStatus = 'SUCCESS' | 'ERROR' | 'SKIPPED';

/**
 * Recorded result of acting on (or skipping) one instance.
 */
export interface ActionOutcome {
  instance: string;
  zone: string;
  /**
   * Requested action as received, unknown ones included.
   */
  intent: string;
  status: OutcomeStatus;
  /**
   * Operation id on success, error message on failure, skip reason otherwise.
   */
  detail: string;
  operation?: PowerOperation;
}

/**
 * Aggregated result of one scheduler run.
 */
export interface ScaleResult {
  processedCount: number;
  outcomes: ActionOutcome[];
  message?: string;
}

/**
 * Returned instead of a ScaleResult when the run could not start.
 */
export interface ScaleFailure {
  error: string;
  errorType: string;
}

export type ScaleResponse = ScaleResult | ScaleFailure;

/**
 * Scale request after decoding. Absent fields fall back to configuration.
 */
export interface ScaleRequest {
  intent: string;
  projectId?: string;
  selector?: LabelSelector;
  zones?: string[];
}

/**
 * Instance entry as returned by the control plane listing.
 */
export interface ListedInstance {
  name: string;
  labels: Record<string, string>;
  status: string;
}

/**
 * Operations the scheduler needs from the compute control plane.
 *
 * Every method may reject with a transport or permission error. Power
 * operations resolve to the id of the operation the control plane accepted.
 */
export interface ComputeControlPlane {
  list(project: string, zone: string): Promise<ListedInstance[]>;
  start(project: string, zone: string, name: string): Promise<string>;
  stop(project: string, zone: string, name: string): Promise<string>;
  suspend(project: string, zone: string, name: string): Promise<string>;
  resume(project: string, zone: string, name: string): Promise<string>;
}

export function isScaleFailure(response: ScaleResponse): response is ScaleFailure {
  return 'error' in response;
}
