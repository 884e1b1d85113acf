import { SessionState } from '../config/types';
import { logger } from '../observability/logger';
import { stateTransitions } from '../observability/metrics';

export type TurnOutcome = 'answered' | 'fallback' | 'escalated';

/** Allowed edges; ESCALATED has none, so it holds until the session expires */
const EDGES: Record<SessionState, ReadonlySet<SessionState>> = {
  NEW: new Set<SessionState>(['ACTIVE', 'ESCALATED']),
  ACTIVE: new Set<SessionState>(['ESCALATED']),
  ESCALATED: new Set<SessionState>(),
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return EDGES[from].has(to);
}

/** Where a turn outcome wants to take the session; a fallback only raises the escalated flag */
export function targetState(current: SessionState, outcome: TurnOutcome): SessionState {
  if (outcome === 'escalated') return 'ESCALATED';
  if (outcome === 'answered' && current === 'NEW') return 'ACTIVE';
  return current;
}

export class StateMachine {
  private readonly log = logger.child({ component: 'state-machine' });

  /** Next state after a turn; edges outside the table leave the state unchanged */
  advance(sessionId: string, current: SessionState, outcome: TurnOutcome, reason: string): SessionState {
    const target = targetState(current, outcome);
    if (target === current) return current;

    if (!canTransition(current, target)) {
      this.log.warn({ sessionId, from: current, to: target, reason }, 'Invalid state transition attempted');
      return current;
    }

    stateTransitions.inc({ from: current, to: target });
    this.log.info({ sessionId, from: current, to: target, reason }, 'State transition');
    return target;
  }
}

export const stateMachine = new StateMachine();
