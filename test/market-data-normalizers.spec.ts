import { describe, expect, it } from 'vitest';
import {
  extractRecords,
  normalizeDerivativeEvent,
  normalizeHaltEntry,
  normalizeInsiderTrade,
  normalizeQuote,
  parseRecords,
  resolveTradeSide,
} from '@libs/market-data';

describe('market data normalizers', () => {
  it('normalizes screener quotes with formatted numbers', () => {
    expect(
      normalizeQuote({
        symbol: ' abc ',
        regularMarketPrice: '1,234.50',
        regularMarketChangePercent: '5.5%',
        regularMarketVolume: 1000,
        bid: '$1,234.00',
        bidSize: 3,
      }),
    ).toEqual({
      symbol: 'ABC',
      price: 1234.5,
      changePercent: 5.5,
      volume: 1000,
      bid: 1234,
      bidSize: 3,
      ask: 0,
      askSize: 0,
    });
  });

  it('falls back to alternative field names', () => {
    const quote = normalizeQuote({ symbol: 'XYZ', lastPrice: 2, percentChange: -3, volume: 10 });
    expect(quote?.price).toBe(2);
    expect(quote?.changePercent).toBe(-3);
    expect(quote?.volume).toBe(10);
  });

  it('drops quotes without price, change or volume', () => {
    expect(normalizeQuote({ symbol: 'XYZ', price: null, changePercent: 1, volume: 1 })).toBeNull();
    expect(normalizeQuote({ symbol: 'XYZ', price: 1, changePercent: 'n/a', volume: 1 })).toBeNull();
    expect(normalizeQuote({ symbol: '', price: 1, changePercent: 1, volume: 1 })).toBeNull();
    expect(normalizeQuote('XYZ')).toBeNull();
  });

  it('unwraps provider envelopes', () => {
    expect(extractRecords([1, 2])).toEqual([1, 2]);
    expect(extractRecords({ body: [1] })).toEqual([1]);
    expect(extractRecords({ body: { data: [2] } })).toEqual([2]);
    expect(extractRecords({ data: [3] })).toEqual([3]);
    expect(extractRecords({ body: 'oops' })).toEqual([]);
    expect(extractRecords(null)).toEqual([]);
  });

  it('counts dropped records', () => {
    const result = parseRecords(
      [{ symbol: 'AAA', price: 1, changePercent: 1, volume: 1 }, { symbol: 'BBB' }],
      normalizeQuote,
    );
    expect(result.items.map((q) => q.symbol)).toEqual(['AAA']);
    expect(result.dropped).toBe(1);
  });

  it('maps transaction text to a side', () => {
    expect(resolveTradeSide('Sale at price 10.00')).toBe('SELL');
    expect(resolveTradeSide('S - Sale')).toBe('SELL');
    expect(resolveTradeSide('P - Purchase')).toBe('BUY');
    expect(resolveTradeSide('Option Exercise')).toBe('OTHER');
    expect(resolveTradeSide(undefined)).toBe('OTHER');
  });

  it('normalizes insider trades', () => {
    expect(
      normalizeInsiderTrade({
        ticker: 'xyz',
        insiderName: 'Jane Doe',
        transactionText: 'Sale at price 10.00',
        sharesTraded: '-15,000',
        lastPrice: '10.5',
        transactionDate: '',
      }),
    ).toEqual({
      symbol: 'XYZ',
      insiderName: 'Jane Doe',
      side: 'SELL',
      shares: 15_000,
      price: 10.5,
      transactionDate: null,
    });
  });

  it('uses the requested symbol when the row has none', () => {
    const trade = normalizeInsiderTrade({ shares: 100, type: 'Purchase' }, 'ABC');
    expect(trade?.symbol).toBe('ABC');
    expect(trade?.insiderName).toBe('Unknown');
    expect(trade?.side).toBe('BUY');
  });

  it('derives the underlying and ratio of option contracts', () => {
    expect(
      normalizeDerivativeEvent({ symbol: 'XYZ|20240621|50.00C', volume: '12,000', openInterest: 1000 }),
    ).toEqual({
      contract: 'XYZ|20240621|50.00C',
      underlying: 'XYZ',
      volume: 12_000,
      openInterest: 1000,
      volOiRatio: 12,
    });

    const noInterest = normalizeDerivativeEvent({ symbol: 'XYZ240621C00050000', baseSymbol: 'xyz', volume: 10 });
    expect(noInterest?.underlying).toBe('XYZ');
    expect(noInterest?.volOiRatio).toBe(Number.POSITIVE_INFINITY);
  });

  it('treats halts without a resumption time as active', () => {
    expect(normalizeHaltEntry({ symbol: 'xyz', reasonCode: 'LUDP', resumptionTradeTime: '' })).toEqual({
      symbol: 'XYZ',
      halted: true,
      reason: 'LUDP',
    });
    expect(normalizeHaltEntry({ issueSymbol: 'ABC', resumptionTradeTime: '10:05:00' })?.halted).toBe(false);
  });
});
