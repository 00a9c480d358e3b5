import { z } from 'zod';
import {
  DerivativeEvent,
  HaltEntry,
  InsiderTrade,
  InstrumentSnapshot,
  ParseResult,
  TradeSide,
} from './models';

const toNumber = (v: unknown): unknown => {
  if (v === null) return undefined;
  if (typeof v === 'number') return v;
  if (typeof v !== 'string') return v;
  const cleaned = v.replace(/[,$%\s]/g, '');
  if (!cleaned) return undefined;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : v;
};

const optionalNumber = z.preprocess(toNumber, z.number().finite().optional());

const optionalText = z.preprocess((v) => {
  if (v === null) return undefined;
  const text = typeof v === 'number' ? String(v) : v;
  if (typeof text !== 'string') return text;
  const trimmed = text.trim();
  return trimmed ? trimmed : undefined;
}, z.string().optional());

const symbolText = z
  .string()
  .trim()
  .min(1)
  .max(32)
  .transform((value) => value.toUpperCase());

const quoteRecordSchema = z.object({
  symbol: symbolText,
  regularMarketPrice: optionalNumber,
  lastPrice: optionalNumber,
  price: optionalNumber,
  regularMarketChangePercent: optionalNumber,
  changePercent: optionalNumber,
  percentChange: optionalNumber,
  regularMarketVolume: optionalNumber,
  volume: optionalNumber,
  bid: optionalNumber,
  bidSize: optionalNumber,
  ask: optionalNumber,
  askSize: optionalNumber,
});

const insiderRecordSchema = z.object({
  symbol: optionalText,
  ticker: optionalText,
  insiderName: optionalText,
  name: optionalText,
  transactionType: optionalText,
  transactionText: optionalText,
  type: optionalText,
  sharesTraded: optionalNumber,
  shares: optionalNumber,
  sharesTransacted: optionalNumber,
  lastPrice: optionalNumber,
  price: optionalNumber,
  transactionDate: optionalText,
  date: optionalText,
});

const derivativeRecordSchema = z.object({
  symbol: z.string().trim().min(1),
  baseSymbol: optionalText,
  underlying: optionalText,
  underlyingSymbol: optionalText,
  volume: z.preprocess(toNumber, z.number().finite().nonnegative()),
  openInterest: optionalNumber,
  volumeOpenInterestRatio: optionalNumber,
  volOiRatio: optionalNumber,
});

const haltRecordSchema = z.object({
  symbol: optionalText,
  issueSymbol: optionalText,
  reasonCode: optionalText,
  reason: optionalText,
  resumptionTime: optionalText,
  resumptionTradeTime: optionalText,
});

/**
 * Provider responses wrap their rows in `body`, sometimes one level deeper in
 * `body.data`. Anything else is treated as no rows.
 */
export const extractRecords = (payload: unknown): unknown[] => {
  if (Array.isArray(payload)) return payload;
  if (!payload || typeof payload !== 'object') return [];

  const body: unknown = 'body' in payload ? payload.body : undefined;
  if (Array.isArray(body)) return body;
  if (body && typeof body === 'object' && 'data' in body && Array.isArray(body.data)) {
    return body.data;
  }
  if ('data' in payload && Array.isArray(payload.data)) return payload.data;
  return [];
};

export const parseRecords = <T>(
  records: unknown[],
  normalize: (record: unknown) => T | null,
): ParseResult<T> => {
  const items: T[] = [];
  let dropped = 0;
  for (const record of records) {
    const item = normalize(record);
    if (item === null) {
      dropped += 1;
    } else {
      items.push(item);
    }
  }
  return { items, dropped };
};

const upperSymbol = (value: string | undefined): string | null => {
  const trimmed = value?.trim().toUpperCase();
  return trimmed ? trimmed : null;
};

export const normalizeQuote = (record: unknown): InstrumentSnapshot | null => {
  const parsed = quoteRecordSchema.safeParse(record);
  if (!parsed.success) return null;
  const row = parsed.data;

  const price = row.regularMarketPrice ?? row.lastPrice ?? row.price;
  const changePercent = row.regularMarketChangePercent ?? row.changePercent ?? row.percentChange;
  const volume = row.regularMarketVolume ?? row.volume;
  if (price === undefined || changePercent === undefined || volume === undefined || volume < 0) {
    return null;
  }

  return {
    symbol: row.symbol,
    price,
    changePercent,
    volume,
    bid: row.bid ?? 0,
    bidSize: row.bidSize ?? 0,
    ask: row.ask ?? 0,
    askSize: row.askSize ?? 0,
  };
};

export const resolveTradeSide = (text: string | undefined): TradeSide => {
  const normalized = (text ?? '').trim().toLowerCase();
  if (/^s\b|sale|sell|sold/.test(normalized)) return 'SELL';
  if (/^p\b|purchase|buy|bought/.test(normalized)) return 'BUY';
  return 'OTHER';
};

export const normalizeInsiderTrade = (record: unknown, fallbackSymbol?: string): InsiderTrade | null => {
  const parsed = insiderRecordSchema.safeParse(record);
  if (!parsed.success) return null;
  const row = parsed.data;

  const symbol = upperSymbol(row.symbol ?? row.ticker ?? fallbackSymbol);
  const shares = row.sharesTraded ?? row.shares ?? row.sharesTransacted;
  if (!symbol || shares === undefined) return null;

  return {
    symbol,
    insiderName: row.insiderName ?? row.name ?? 'Unknown',
    side: resolveTradeSide(row.transactionType ?? row.transactionText ?? row.type),
    shares: Math.abs(shares),
    price: row.lastPrice ?? row.price ?? null,
    transactionDate: row.transactionDate ?? row.date ?? null,
  };
};

const underlyingFromContract = (contract: string): string | null => {
  const [head] = contract.split('|');
  const match = head.trim().toUpperCase().match(/^[A-Z][A-Z.]*/);
  return match ? match[0] : null;
};

export const normalizeDerivativeEvent = (record: unknown): DerivativeEvent | null => {
  const parsed = derivativeRecordSchema.safeParse(record);
  if (!parsed.success) return null;
  const row = parsed.data;

  const underlying =
    upperSymbol(row.baseSymbol ?? row.underlying ?? row.underlyingSymbol) ??
    underlyingFromContract(row.symbol);
  if (!underlying) return null;

  const openInterest = Math.max(0, row.openInterest ?? 0);
  const provided = row.volumeOpenInterestRatio ?? row.volOiRatio;
  const computed =
    openInterest > 0 ? row.volume / openInterest : row.volume > 0 ? Number.POSITIVE_INFINITY : 0;

  return {
    contract: row.symbol,
    underlying,
    volume: row.volume,
    openInterest,
    volOiRatio: provided ?? computed,
  };
};

export const normalizeHaltEntry = (record: unknown): HaltEntry | null => {
  const parsed = haltRecordSchema.safeParse(record);
  if (!parsed.success) return null;
  const row = parsed.data;

  const symbol = upperSymbol(row.symbol ?? row.issueSymbol);
  if (!symbol) return null;

  const resumption = row.resumptionTradeTime ?? row.resumptionTime ?? '';
  return {
    symbol,
    halted: resumption.length === 0,
    reason: row.reasonCode ?? row.reason ?? null,
  };
};
