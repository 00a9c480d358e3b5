import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosInstance } from 'axios';
import { MarketDataSource } from '../interfaces';
import { DerivativeEvent, InsiderTrade, InstrumentSnapshot } from '../models';
import {
  normalizeDerivativeEvent,
  normalizeHaltEntry,
  normalizeInsiderTrade,
  normalizeQuote,
} from '../normalizers';
import { createHttpClient } from '../utils/http.util';
import { BaseRestProvider } from './base-rest.provider';

export const MBOUM_HTTP_CLIENT = Symbol('MBOUM_HTTP_CLIENT');

interface MboumPaths {
  screener: string;
  insiderTrades: string;
  unusualOptions: string;
  halts: string;
}

@Injectable()
export class MboumMarketDataProvider extends BaseRestProvider implements MarketDataSource {
  private readonly paths: MboumPaths;
  private readonly screenerFilter: string;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(MBOUM_HTTP_CLIENT) http?: AxiosInstance,
  ) {
    const apiKey = configService.get<string>('MBOUM_API_KEY', '');
    if (!apiKey && !http) throw new Error('MBOUM_API_KEY is required');

    super(
      'mboum',
      http ??
        createHttpClient(
          configService.get<string>('MBOUM_BASE_URL', 'https://api.mboum.com'),
          configService.get<number>('MBOUM_REQUEST_TIMEOUT_MS', 10_000),
          { Authorization: apiKey },
        ),
    );

    this.screenerFilter = configService.get<string>('MBOUM_SCREENER_FILTER', 'day_gainers');
    this.paths = {
      screener: configService.get<string>('MBOUM_SCREENER_PATH', '/v1/screener'),
      insiderTrades: configService.get<string>('MBOUM_INSIDER_TRADES_PATH', '/v1/markets/insider-trades'),
      unusualOptions: configService.get<string>(
        'MBOUM_UNUSUAL_OPTIONS_PATH',
        '/v1/markets/options/unusual-options-activity',
      ),
      halts: configService.get<string>('MBOUM_HALTS_PATH', '/v1/markets/stock/halts'),
    };
  }

  async fetchTopMovers(limit: number): Promise<InstrumentSnapshot[]> {
    const quotes = await this.fetchRows(
      'screener',
      this.paths.screener,
      { metricType: 'overview', filter: this.screenerFilter, limit: String(limit) },
      normalizeQuote,
    );
    return quotes.slice(0, limit);
  }

  async fetchInsiderTrades(symbol?: string): Promise<InsiderTrade[]> {
    const ticker = symbol?.trim().toUpperCase();
    const trades = await this.fetchRows(
      ticker ? `insider-trades ${ticker}` : 'insider-trades',
      this.paths.insiderTrades,
      ticker ? { ticker } : undefined,
      (record) => normalizeInsiderTrade(record, ticker),
    );
    // the endpoint ignores unknown tickers and returns the latest filings instead
    return ticker ? trades.filter((trade) => trade.symbol === ticker) : trades;
  }

  async fetchUnusualDerivativeActivity(): Promise<DerivativeEvent[]> {
    return this.fetchRows(
      'unusual-options',
      this.paths.unusualOptions,
      { type: 'STOCKS' },
      normalizeDerivativeEvent,
    );
  }

  async fetchHaltStatus(symbol: string): Promise<boolean> {
    const ticker = symbol.trim().toUpperCase();
    const halts = await this.fetchRows(
      `halts ${ticker}`,
      this.paths.halts,
      { ticker },
      normalizeHaltEntry,
    );
    return halts.some((entry) => entry.symbol === ticker && entry.halted);
  }
}
