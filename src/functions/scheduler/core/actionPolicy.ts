/**
 * Per-instance decision table.
 *
 * Maps a requested intent and an instance's current state to either a skip or
 * the control-plane operation to perform. Instances already at the target
 * state are always skipped, so a settled fleet yields no actions.
 */

import type { Decision, InstanceState, ScaleConfig } from '@shared/types';

/**
 * States in which an instance is already at rest for scale_down.
 */
const AT_REST_STATES: ReadonlySet<InstanceState> = new Set<InstanceState>([
  'STOPPED',
  'TERMINATED',
  'SUSPENDED',
]);

/**
 * Decide what to do with one instance.
 *
 * @param intent - Requested action as received (e.g. "scale_up")
 * @param currentState - State captured at discovery time
 * @param config - Operation choices for each direction
 */
export function decide(intent: string, currentState: InstanceState, config: ScaleConfig): Decision {
  switch (intent) {
    case 'scale_down':
      if (AT_REST_STATES.has(currentState)) {
        return { kind: 'skip', reason: `Instance already ${currentState}` };
      }
      return {
        kind: 'perform',
        operation: config.scaleDownOperation === 'SUSPEND' ? 'suspend' : 'stop',
      };

    case 'scale_up':
      if (currentState === 'RUNNING') {
        return { kind: 'skip', reason: 'Instance already RUNNING' };
      }
      return {
        kind: 'perform',
        operation: config.scaleUpOperation === 'RESUME' ? 'resume' : 'start',
      };

    default:
      return { kind: 'unknown', message: `Unknown action: ${intent}` };
  }
}
