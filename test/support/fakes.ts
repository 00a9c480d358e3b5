import type {
  DerivativeEvent,
  InsiderTrade,
  InstrumentSnapshot,
  MarketDataSource,
  SourceSnapshot,
} from '@libs/market-data';
import type { AlertSink, NotificationKind } from '@libs/telegram';
import { AlertDispatcher } from '../../apps/worker/src/alerts/alert-dispatcher.service';
import { AlertSettings, DEFAULT_ALERT_SETTINGS } from '../../apps/worker/src/alerts/alert-settings';
import { AlertState } from '../../apps/worker/src/alerts/alert-state';

export const snapshot = (overrides: Partial<InstrumentSnapshot> & { symbol: string }): InstrumentSnapshot => ({
  price: 10,
  changePercent: 0,
  volume: 0,
  bid: 0,
  bidSize: 0,
  ask: 0,
  askSize: 0,
  ...overrides,
});

export const insiderTrade = (overrides: Partial<InsiderTrade> & { symbol: string }): InsiderTrade => ({
  insiderName: 'Jane Doe',
  side: 'BUY',
  shares: 0,
  price: null,
  transactionDate: null,
  ...overrides,
});

export class FakeMarketDataSource implements MarketDataSource {
  readonly source = 'fake';
  movers: InstrumentSnapshot[] = [];
  derivatives: DerivativeEvent[] = [];
  readonly insiderTrades = new Map<string, InsiderTrade[]>();
  readonly halted = new Set<string>();
  readonly insiderLookups: string[] = [];
  readonly haltChecks: string[] = [];

  async fetchTopMovers(limit: number): Promise<InstrumentSnapshot[]> {
    return this.movers.slice(0, limit);
  }

  async fetchInsiderTrades(symbol?: string): Promise<InsiderTrade[]> {
    if (!symbol) return Array.from(this.insiderTrades.values()).flat();
    this.insiderLookups.push(symbol);
    return this.insiderTrades.get(symbol) ?? [];
  }

  async fetchUnusualDerivativeActivity(): Promise<DerivativeEvent[]> {
    return this.derivatives;
  }

  async fetchHaltStatus(symbol: string): Promise<boolean> {
    this.haltChecks.push(symbol);
    return this.halted.has(symbol);
  }

  getSnapshot(): SourceSnapshot {
    return {
      source: this.source,
      requests: 0,
      failures: 0,
      droppedRecords: 0,
      lastError: null,
      lastSuccessTs: null,
    };
  }
}

export class RecordingSink implements AlertSink {
  readonly sent: { text: string; kind: NotificationKind }[] = [];
  delivered = true;

  async send(text: string, kind: NotificationKind): Promise<boolean> {
    this.sent.push({ text, kind });
    return this.delivered;
  }

  kinds(): NotificationKind[] {
    return this.sent.map((message) => message.kind);
  }
}

export interface Harness {
  settings: AlertSettings;
  state: AlertState;
  source: FakeMarketDataSource;
  sink: RecordingSink;
  dispatcher: AlertDispatcher;
}

export const createHarness = (overrides: Partial<AlertSettings> = {}): Harness => {
  const settings: AlertSettings = { ...DEFAULT_ALERT_SETTINGS, ...overrides };
  const state = new AlertState(settings);
  const source = new FakeMarketDataSource();
  const sink = new RecordingSink();
  return { settings, state, source, sink, dispatcher: new AlertDispatcher(state, sink) };
};
