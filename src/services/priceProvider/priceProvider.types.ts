import { PriceSeries, PriceSeriesRequest } from '@models/priceSeries.types';

/** Source of daily closes for a symbol. */
export interface PriceProvider {
  /**
   * @throws UnknownSymbolError when the symbol does not exist
   * @throws NoPriceDataError when the symbol exists but has no bar in the range
   * @throws PriceProviderNetworkError when the provider could not be reached
   */
  getPriceSeries(request: PriceSeriesRequest): Promise<PriceSeries>;
}
