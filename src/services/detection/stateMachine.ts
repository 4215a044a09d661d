import type { HealthState, Transition, TransitionContext } from './types';

export const INITIAL_HEALTH: Readonly<HealthState> = {
  isUp: true,
  consecutiveFailures: 0,
  consecutiveSuccesses: 0,
  incidentStartTime: null,
};

/**
 * Apply one check outcome to a target's health state.
 *
 * UP turns DOWN after `failureThreshold` consecutive failures and DOWN turns
 * UP after `recoveryThreshold` consecutive successes. The incident start is
 * backdated to the first failing check, assuming a constant interval.
 */
export function applyCheckOutcome(
  state: HealthState,
  success: boolean,
  context: TransitionContext
): Transition {
  if (success) {
    const consecutiveSuccesses = state.consecutiveSuccesses + 1;

    if (!state.isUp && consecutiveSuccesses >= context.recoveryThreshold) {
      return {
        next: {
          isUp: true,
          consecutiveFailures: 0,
          consecutiveSuccesses,
          incidentStartTime: null,
        },
        event: {
          type: 'recovered',
          incidentStart: state.incidentStartTime ?? context.now,
          incidentEnd: context.now,
        },
      };
    }

    return {
      next: { ...state, consecutiveFailures: 0, consecutiveSuccesses },
      event: { type: 'none' },
    };
  }

  const consecutiveFailures = state.consecutiveFailures + 1;

  if (state.isUp && consecutiveFailures >= context.failureThreshold) {
    const backdateMs = context.checkIntervalSeconds * 1000 * (consecutiveFailures - 1);
    const incidentStart = new Date(context.now.getTime() - backdateMs);

    return {
      next: {
        isUp: false,
        consecutiveFailures,
        consecutiveSuccesses: 0,
        incidentStartTime: incidentStart,
      },
      event: { type: 'down', incidentStart, failureCount: consecutiveFailures },
    };
  }

  return {
    next: { ...state, consecutiveFailures, consecutiveSuccesses: 0 },
    event: { type: 'none' },
  };
}
