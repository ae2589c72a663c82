import { PositionSnapshot } from '../ports/IBrokerageAdapter';

/**
 * AssetState entity - one held asset as seen at the start of a funding cycle
 */
export class AssetState {
  constructor(
    public readonly symbol: string,
    public readonly equity: number, // Market value in USD
    public readonly price: number, // Current unit price in USD
  ) {
    if (!symbol) {
      throw new Error('Asset symbol is required');
    }

    if (!(equity >= 0)) {
      throw new Error(`Equity for ${symbol} must be non-negative, got ${equity}`);
    }

    if (!(price > 0)) {
      throw new Error(`Price for ${symbol} must be greater than 0, got ${price}`);
    }
  }

  static fromSnapshot(position: PositionSnapshot): AssetState {
    return new AssetState(
      position.symbol,
      position.marketValue.toNumber(),
      position.currentPrice.toNumber(),
    );
  }
}
