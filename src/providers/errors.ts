/** Transport, HTTP status or payload fault raised by a market data provider. */
export class MarketDataError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
  ) {
    super(`${provider}: ${message}`);
    this.name = 'MarketDataError';
  }
}
