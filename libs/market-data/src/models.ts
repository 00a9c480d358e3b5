/** Point-in-time quote of one instrument, produced fresh on every poll. */
export interface InstrumentSnapshot {
  readonly symbol: string;
  readonly price: number;
  readonly changePercent: number;
  readonly volume: number;
  readonly bid: number;
  readonly bidSize: number;
  readonly ask: number;
  readonly askSize: number;
}

export type TradeSide = 'BUY' | 'SELL' | 'OTHER';

export interface InsiderTrade {
  readonly symbol: string;
  readonly insiderName: string;
  readonly side: TradeSide;
  readonly shares: number;
  readonly price: number | null;
  readonly transactionDate: string | null;
}

/** One derivative contract reported as unusually active. */
export interface DerivativeEvent {
  readonly contract: string;
  readonly underlying: string;
  readonly volume: number;
  readonly openInterest: number;
  readonly volOiRatio: number;
}

export interface HaltEntry {
  readonly symbol: string;
  readonly halted: boolean;
  readonly reason: string | null;
}

export interface SourceSnapshot {
  source: string;
  requests: number;
  failures: number;
  droppedRecords: number;
  lastError: string | null;
  lastSuccessTs: number | null;
}

export interface ParseResult<T> {
  items: T[];
  dropped: number;
}
