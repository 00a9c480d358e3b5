export * from './alert-sink';
export * from './telegram.formatter';
export * from './telegram.service';
export * from './telegram.module';
