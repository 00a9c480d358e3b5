export * from './models';
export * from './interfaces';
export * from './normalizers';
export * from './market-data.module';
export * from './providers/base-rest.provider';
export * from './providers/mboum.provider';
export * from './utils/http.util';
