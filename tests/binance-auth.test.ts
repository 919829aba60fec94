import { describe, it, expect } from 'vitest';
import { buildSignedQuery, signQuery, toQueryString } from '../src/exchange/binance/auth.js';
import { restBaseUrl, toExchangeSymbol } from '../src/exchange/binance/endpoints.js';

describe('Binance request signing', () => {
  it('should keep parameter insertion order', () => {
    expect(toQueryString({ symbol: 'ADAUSDT', side: 'BUY', type: 'MARKET' })).toBe('symbol=ADAUSDT&side=BUY&type=MARKET');
  });

  it('should sign with lowercase hex HMAC-SHA256', () => {
    const query = 'symbol=ADAUSDT&side=BUY&type=MARKET&quantity=125&recvWindow=5000&timestamp=1700000000000';
    expect(signQuery(query, 'test-secret')).toBe('68eff5edd9c56102eb81ee0fccccd157e3a15a668540e022e65182db40b25517');
  });

  it('should append recvWindow, timestamp and signature', () => {
    const query = buildSignedQuery({ symbol: 'ADAUSDT' }, 'test-secret', 1_700_000_000_000);
    expect(query).toBe(
      'symbol=ADAUSDT&recvWindow=5000&timestamp=1700000000000' +
        '&signature=006dd8a384293157af3bbd2d0a16b81c9708ef89e08640a1ec54179e4b5032a2',
    );
  });

  it('should throw without a secret', () => {
    expect(() => buildSignedQuery({ symbol: 'ADAUSDT' }, '')).toThrow('not configured');
  });
});

describe('Binance endpoints', () => {
  it('should pick testnet in sandbox mode unless overridden', () => {
    expect(restBaseUrl(true)).toBe('https://testnet.binance.vision');
    expect(restBaseUrl(false)).toBe('https://api.binance.com');
    expect(restBaseUrl(false, 'http://localhost:9000')).toBe('http://localhost:9000');
  });

  it('should drop the pair separator', () => {
    expect(toExchangeSymbol('ADA/USDT')).toBe('ADAUSDT');
  });
});
