import { createChildLogger } from '../logger.js';
import type { Reservation } from '../types/index.js';

const log = createChildLogger('balance-ledger');

/**
 * 자산별 잔고 예약 원장
 *
 * 여러 페어가 같은 쿼트 자산(USDT 등)을 공유하므로, 사이징 시점에 배분 금액을
 * 비관적으로 예약하고 포지션 종결/취소 시 해제한다.
 *
 * - held: 예약만 됨 (거래소 미접수) → 거래소 잔고에 아직 반영 안 됨
 * - placed: 거래소 접수됨 → 접수 이후 읽은 잔고에는 이미 반영
 *
 * available(asset, free, token)은 잔고 조회(beginRead) 이후에 접수된 예약까지
 * 차감하므로, 조회와 예약 사이에 다른 페어가 끼어들어도 초과 배분되지 않는다.
 */
export class BalanceLedger {
  private readonly reservations = new Map<string, Reservation>();
  private version = 0;

  /** 잔고 조회 직전에 호출: 반환 토큰을 available()에 전달 */
  beginRead(): number {
    return this.version;
  }

  /**
   * 거래소 가용 잔고에서 아직 반영되지 않은 예약을 뺀 값
   */
  available(asset: string, exchangeFree: number, readToken: number): number {
    let pending = 0;
    for (const r of this.reservations.values()) {
      if (r.asset !== asset) continue;
      if (r.placedVersion === undefined || r.placedVersion > readToken) {
        pending += r.amount;
      }
    }
    return Math.max(0, exchangeFree - pending);
  }

  reserve(symbol: string, clientOrderId: string, asset: string, amount: number): Reservation {
    const id = reservationKey(symbol, clientOrderId);
    if (this.reservations.has(id)) {
      throw new Error(`Duplicate reservation ${id}`);
    }
    const reservation: Reservation = { id, symbol, asset, amount };
    this.reservations.set(id, reservation);
    log.debug({ id, asset, amount }, 'Reserved');
    return reservation;
  }

  /** 거래소 접수 확인 */
  markPlaced(id: string): void {
    const r = this.reservations.get(id);
    if (!r) return;
    this.version++;
    r.placedVersion = this.version;
  }

  release(id: string): void {
    if (this.reservations.delete(id)) {
      log.debug({ id }, 'Released');
    }
  }

  /** 재시작 복구용 */
  restore(reservation: Reservation): void {
    this.reservations.set(reservation.id, { ...reservation });
    if (reservation.placedVersion !== undefined && reservation.placedVersion > this.version) {
      this.version = reservation.placedVersion;
    }
  }

  /** 페어 전체 예약 합계 (자산별): 페어 단위 배분 상한 집계용 */
  committed(symbol: string, asset: string): number {
    let sum = 0;
    for (const r of this.reservations.values()) {
      if (r.symbol === symbol && r.asset === asset) sum += r.amount;
    }
    return sum;
  }

  list(symbol?: string): Reservation[] {
    const all = [...this.reservations.values()];
    return symbol ? all.filter((r) => r.symbol === symbol) : all;
  }
}

export function reservationKey(symbol: string, clientOrderId: string): string {
  return `${symbol}:${clientOrderId}`;
}
