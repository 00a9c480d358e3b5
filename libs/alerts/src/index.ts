export * from './types';
export * from './market-clock';
export * from './volume-baseline';
export * from './rule-evaluator';
export * from './alert-ledger';
export * from './watchlist';
