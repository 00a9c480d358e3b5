import { DerivativeEvent, InsiderTrade, InstrumentSnapshot, SourceSnapshot } from './models';

export const MARKET_DATA_SOURCE = Symbol('MARKET_DATA_SOURCE');

/**
 * Read-only view of the quote provider. Implementations never reject: a
 * transport failure, timeout or malformed body yields an empty result.
 */
export interface MarketDataSource {
  readonly source: string;
  fetchTopMovers(limit: number): Promise<InstrumentSnapshot[]>;
  fetchInsiderTrades(symbol?: string): Promise<InsiderTrade[]>;
  fetchUnusualDerivativeActivity(): Promise<DerivativeEvent[]>;
  fetchHaltStatus(symbol: string): Promise<boolean>;
  getSnapshot(): SourceSnapshot;
}
