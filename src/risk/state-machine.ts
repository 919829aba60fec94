import { createChildLogger } from '../logger.js';
import { InvariantViolationError } from '../errors.js';
import { isTerminal, type PositionState } from '../types/index.js';

const log = createChildLogger('state-machine');

type StateTransition = [PositionState, PositionState];

/** 허용된 상태 전이 */
const VALID_TRANSITIONS: StateTransition[] = [
  ['PENDING', 'OPEN'],              // 진입 체결
  ['PENDING', 'CANCELLED'],         // 진입 취소/만료 (미체결)
  ['OPEN', 'EXIT_PENDING'],         // 손절/익절/하락추세 시그널
  ['EXIT_PENDING', 'CLOSED'],       // 청산 체결
  ['EXIT_PENDING', 'OPEN'],         // 청산 실패/취소 → 다시 모니터링
];

export interface StateChange {
  readonly from: PositionState;
  readonly to: PositionState;
  readonly at: number;
}

/**
 * 포지션 상태 머신
 * CLOSED/CANCELLED는 종결: 이후 어떤 전이도 불가
 * 잘못된 전이 시도 시 InvariantViolationError (안전장치)
 */
export class PositionStateMachine {
  private state: PositionState;
  private stateEnteredAt: number;
  private history: StateChange[] = [];

  constructor(
    private readonly positionId: string,
    initial: PositionState = 'PENDING',
    enteredAt: number = Date.now(),
  ) {
    this.state = initial;
    this.stateEnteredAt = enteredAt;
  }

  get current(): PositionState {
    return this.state;
  }

  get enteredAt(): number {
    return this.stateEnteredAt;
  }

  transition(to: PositionState, at: number = Date.now()): void {
    if (!this.canTransition(to)) {
      const msg = `Invalid position transition: ${this.state} → ${to}`;
      log.error({ positionId: this.positionId, from: this.state, to }, msg);
      throw new InvariantViolationError(`${msg} (position ${this.positionId})`);
    }

    log.debug({ positionId: this.positionId, from: this.state, to }, 'Position transition');
    this.history.push({ from: this.state, to, at });
    if (this.history.length > 100) this.history = this.history.slice(-50);
    this.state = to;
    this.stateEnteredAt = at;
  }

  canTransition(to: PositionState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  isTerminal(): boolean {
    return isTerminal(this.state);
  }

  getHistory(): ReadonlyArray<StateChange> {
    return this.history;
  }
}
