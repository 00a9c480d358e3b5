import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MARKET_DATA_SOURCE } from './interfaces';
import { MboumMarketDataProvider } from './providers/mboum.provider';

@Module({
  imports: [ConfigModule],
  providers: [
    MboumMarketDataProvider,
    { provide: MARKET_DATA_SOURCE, useExisting: MboumMarketDataProvider },
  ],
  exports: [MARKET_DATA_SOURCE],
})
export class MarketDataModule {}
