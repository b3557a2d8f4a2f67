import { MarketDataProvider } from './marketData.types';
import { StubMarketDataProvider } from './marketData.stub';
import { EastMoneyMarketDataProvider } from './marketData.eastmoney';
import { CachedMarketDataProvider } from './priceCache';
import { AppConfig } from '../core/types';

export interface MarketDataProviders {
  // settlement lookups; never cached
  live: MarketDataProvider;
  // reporting and signal lookups
  cached: MarketDataProvider;
}

export const getMarketDataProviders = (config: AppConfig): MarketDataProviders => {
  const provider = (process.env.MARKET_DATA_PROVIDER || 'stub').toLowerCase();
  let live: MarketDataProvider;
  if (provider === 'eastmoney') {
    live = new EastMoneyMarketDataProvider({ timeoutMs: config.httpTimeoutMs, timezone: config.timezone });
  } else {
    if (provider !== 'stub') {
      console.warn(`Unknown MARKET_DATA_PROVIDER=${provider}; using stub market data.`);
    }
    live = new StubMarketDataProvider();
  }
  return { live, cached: new CachedMarketDataProvider(live, config.priceCacheTtlMs) };
};

export { StubMarketDataProvider, EastMoneyMarketDataProvider, CachedMarketDataProvider };
