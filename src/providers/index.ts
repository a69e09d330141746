import type { Config } from '../config.js';
import type { MarketDataProvider } from '../types/market.js';
import { AlpacaProvider } from './alpaca.js';
import { PolygonProvider } from './polygon.js';

export { AlpacaProvider } from './alpaca.js';
export { PolygonProvider } from './polygon.js';
export { MarketDataError } from './errors.js';

/** Build the provider named by MARKET_DATA_PROVIDER. */
export function createMarketDataProvider(cfg: Config): MarketDataProvider {
  switch (cfg.MARKET_DATA_PROVIDER) {
    case 'alpaca':
      return new AlpacaProvider({
        apiKey: cfg.ALPACA_API_KEY,
        secretKey: cfg.ALPACA_SECRET_KEY,
        baseUrl: cfg.ALPACA_BASE_URL,
        dataUrl: cfg.ALPACA_DATA_URL,
        timeoutMs: cfg.HTTP_TIMEOUT_MS,
      });
    case 'polygon':
      return new PolygonProvider({
        apiKey: cfg.POLYGON_API_KEY,
        baseUrl: cfg.POLYGON_BASE_URL,
        timeoutMs: cfg.HTTP_TIMEOUT_MS,
      });
  }
}
