import { describe, it, expect } from 'vitest';
import { PositionStateMachine } from '../src/risk/state-machine.js';
import { InvariantViolationError } from '../src/errors.js';

describe('PositionStateMachine', () => {
  it('should start in PENDING', () => {
    const sm = new PositionStateMachine('p1');
    expect(sm.current).toBe('PENDING');
    expect(sm.isTerminal()).toBe(false);
  });

  it('should follow the entry → exit lifecycle', () => {
    const sm = new PositionStateMachine('p1', 'PENDING', 0);
    sm.transition('OPEN', 10);
    sm.transition('EXIT_PENDING', 20);
    sm.transition('CLOSED', 30);
    expect(sm.current).toBe('CLOSED');
    expect(sm.isTerminal()).toBe(true);
  });

  it('should allow EXIT_PENDING → OPEN when the exit fails', () => {
    const sm = new PositionStateMachine('p1', 'OPEN');
    sm.transition('EXIT_PENDING');
    sm.transition('OPEN');
    expect(sm.current).toBe('OPEN');
  });

  it('should allow PENDING → CANCELLED', () => {
    const sm = new PositionStateMachine('p1');
    sm.transition('CANCELLED');
    expect(sm.isTerminal()).toBe(true);
  });

  it('should throw InvariantViolationError on invalid transitions', () => {
    const sm = new PositionStateMachine('p1');
    expect(() => sm.transition('EXIT_PENDING')).toThrow(InvariantViolationError);
    expect(() => sm.transition('CLOSED')).toThrow('Invalid position transition: PENDING → CLOSED');
    expect(sm.current).toBe('PENDING');
  });

  it('should reject same-state transitions', () => {
    const sm = new PositionStateMachine('p1', 'OPEN');
    expect(sm.canTransition('OPEN')).toBe(false);
    expect(() => sm.transition('OPEN')).toThrow(InvariantViolationError);
  });

  it('should never leave a terminal state', () => {
    for (const terminal of ['CLOSED', 'CANCELLED'] as const) {
      const sm = new PositionStateMachine('p1', terminal);
      for (const to of ['PENDING', 'OPEN', 'EXIT_PENDING', 'CLOSED', 'CANCELLED'] as const) {
        expect(sm.canTransition(to)).toBe(false);
      }
    }
  });

  it('should record history with timestamps', () => {
    const sm = new PositionStateMachine('p1', 'PENDING', 0);
    sm.transition('OPEN', 100);
    sm.transition('EXIT_PENDING', 250);

    const h = sm.getHistory();
    expect(h).toHaveLength(2);
    expect(h[0]).toEqual({ from: 'PENDING', to: 'OPEN', at: 100 });
    expect(h[1]).toEqual({ from: 'OPEN', to: 'EXIT_PENDING', at: 250 });
    expect(sm.enteredAt).toBe(250);
  });

  it('should cap history when exits keep failing', () => {
    const sm = new PositionStateMachine('p1', 'OPEN', 0);
    for (let i = 1; i <= 51; i++) {
      sm.transition('EXIT_PENDING', i * 2 - 1);
      sm.transition('OPEN', i * 2);
    }
    // 102번째 기록에서 최근 50개만 남김
    const h = sm.getHistory();
    expect(h).toHaveLength(50);
    expect(h[49]).toEqual({ from: 'EXIT_PENDING', to: 'OPEN', at: 102 });
    expect(h[0]).toEqual({ from: 'OPEN', to: 'EXIT_PENDING', at: 53 });
  });
});
