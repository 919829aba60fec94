import { describe, it, expect } from 'vitest';
import { BalanceLedger, reservationKey } from '../src/risk/balance-ledger.js';

describe('BalanceLedger', () => {
  it('should key reservations by pair and client order id', () => {
    const ledger = new BalanceLedger();
    const r = ledger.reserve('ADA/USDT', 'st-e-1', 'USDT', 50);
    expect(r.id).toBe('ADA/USDT:st-e-1');
    expect(reservationKey('ADA/USDT', 'st-e-1')).toBe(r.id);
    expect(ledger.list('ADA/USDT')).toEqual([r]);
  });

  it('should reject a duplicate reservation', () => {
    const ledger = new BalanceLedger();
    ledger.reserve('ADA/USDT', 'st-e-1', 'USDT', 50);
    expect(() => ledger.reserve('ADA/USDT', 'st-e-1', 'USDT', 50)).toThrow('Duplicate reservation');
  });

  it('should subtract held reservations the exchange balance does not show yet', () => {
    const ledger = new BalanceLedger();
    const token = ledger.beginRead();
    ledger.reserve('ADA/USDT', 'a', 'USDT', 50);
    expect(ledger.available('USDT', 1000, token)).toBe(950);
    expect(ledger.available('BTC', 1, token)).toBe(1);
  });

  it('should not double count orders placed before the balance read', () => {
    const ledger = new BalanceLedger();
    const r = ledger.reserve('ADA/USDT', 'a', 'USDT', 50);
    ledger.markPlaced(r.id);
    // 잔고 조회가 접수 이후 → 거래소 잔고에 이미 반영
    const token = ledger.beginRead();
    expect(ledger.available('USDT', 950, token)).toBe(950);
  });

  it('should subtract orders placed after the balance read (cross-pair race)', () => {
    const ledger = new BalanceLedger();
    // 페어 A가 잔고를 읽음
    const tokenA = ledger.beginRead();
    // 그 사이 페어 B가 예약하고 접수까지 완료
    const b = ledger.reserve('XRP/USDT', 'b', 'USDT', 300);
    ledger.markPlaced(b.id);
    // A가 읽은 1000 에는 B 주문이 반영되지 않았다
    expect(ledger.available('USDT', 1000, tokenA)).toBe(700);
    // 이후 조회에서는 반영된 것으로 간주
    expect(ledger.available('USDT', 700, ledger.beginRead())).toBe(700);
  });

  it('should never report a negative balance', () => {
    const ledger = new BalanceLedger();
    ledger.reserve('ADA/USDT', 'a', 'USDT', 500);
    expect(ledger.available('USDT', 100, ledger.beginRead())).toBe(0);
  });

  it('should aggregate committed amounts per pair and asset', () => {
    const ledger = new BalanceLedger();
    ledger.reserve('ADA/USDT', 'a', 'USDT', 50);
    ledger.reserve('ADA/USDT', 'b', 'USDT', 25);
    ledger.reserve('ADA/USDT', 'q', 'ADA', 10);
    ledger.reserve('XRP/USDT', 'c', 'USDT', 99);
    expect(ledger.committed('ADA/USDT', 'USDT')).toBe(75);
    expect(ledger.committed('ADA/USDT', 'ADA')).toBe(10);
    expect(ledger.list('ADA/USDT')).toHaveLength(3);
  });

  it('should release reservations', () => {
    const ledger = new BalanceLedger();
    const r = ledger.reserve('ADA/USDT', 'a', 'USDT', 50);
    ledger.release(r.id);
    expect(ledger.committed('ADA/USDT', 'USDT')).toBe(0);
    expect(ledger.list()).toHaveLength(0);
  });

  it('should restore placed reservations without counting them again', () => {
    const ledger = new BalanceLedger();
    ledger.restore({ id: 'ADA/USDT:a', symbol: 'ADA/USDT', asset: 'USDT', amount: 50, placedVersion: 3 });
    const token = ledger.beginRead();
    expect(token).toBe(3);
    expect(ledger.available('USDT', 950, token)).toBe(950);
    expect(ledger.committed('ADA/USDT', 'USDT')).toBe(50);
  });
});
