import { StateMachine, canTransition, targetState } from '../../src/orchestrator/state-machine';

describe('state machine', () => {
  describe('canTransition', () => {
    it('allows NEW to move to ACTIVE or ESCALATED', () => {
      expect(canTransition('NEW', 'ACTIVE')).toBe(true);
      expect(canTransition('NEW', 'ESCALATED')).toBe(true);
    });

    it('allows ACTIVE to escalate but not to go back', () => {
      expect(canTransition('ACTIVE', 'ESCALATED')).toBe(true);
      expect(canTransition('ACTIVE', 'NEW')).toBe(false);
    });

    it('treats ESCALATED as terminal', () => {
      expect(canTransition('ESCALATED', 'ACTIVE')).toBe(false);
      expect(canTransition('ESCALATED', 'NEW')).toBe(false);
    });
  });

  describe('targetState', () => {
    it('activates a new session on an answer', () => {
      expect(targetState('NEW', 'answered')).toBe('ACTIVE');
      expect(targetState('ACTIVE', 'answered')).toBe('ACTIVE');
    });

    it('leaves the state alone on a fallback', () => {
      expect(targetState('NEW', 'fallback')).toBe('NEW');
      expect(targetState('ACTIVE', 'fallback')).toBe('ACTIVE');
    });

    it('escalates from any state', () => {
      expect(targetState('NEW', 'escalated')).toBe('ESCALATED');
      expect(targetState('ACTIVE', 'escalated')).toBe('ESCALATED');
    });
  });

  describe('StateMachine.advance', () => {
    const sm = new StateMachine();

    it('applies allowed transitions', () => {
      expect(sm.advance('web:a', 'NEW', 'answered', 'greeting')).toBe('ACTIVE');
      expect(sm.advance('web:a', 'ACTIVE', 'escalated', 'out_of_scope')).toBe('ESCALATED');
    });

    it('keeps an escalated session escalated after an answer', () => {
      expect(sm.advance('web:a', 'ESCALATED', 'answered', 'faq')).toBe('ESCALATED');
    });
  });
});
