import { DataUnavailableError } from '@errors/priceProvider/dataUnavailable.error';
import { NoPriceDataError } from '@errors/priceProvider/noPriceData.error';
import { PriceProviderNetworkError } from '@errors/priceProvider/priceProviderNetwork.error';
import { UnknownSymbolError } from '@errors/priceProvider/unknownSymbol.error';
import { PriceSeries, PriceSeriesRequest } from '@models/priceSeries.types';
import { FetcherError } from '@services/fetcher/fetcher.error';
import { fetcher as defaultFetcher, isClientError } from '@services/fetcher/fetcher.service';
import { Fetcher } from '@services/fetcher/fetcher.types';
import { debug } from '@services/logger';
import { toISODate } from '@utils/date/date.utils';
import { PriceProvider } from '../priceProvider.types';
import { YAHOO_HEADERS, YAHOO_NO_DATA_DESCRIPTION, YAHOO_NOT_FOUND_CODE } from './yahoo.const';
import { yahooChartResponseSchema } from './yahoo.schema';
import { buildChartUrl, toPriceSeries } from './yahoo.utils';

export class YahooPriceProvider implements PriceProvider {
  private readonly fetcher: Fetcher;

  constructor(fetcher: Fetcher = defaultFetcher) {
    this.fetcher = fetcher;
  }

  public async getPriceSeries(request: PriceSeriesRequest): Promise<PriceSeries> {
    const { symbol, start, end } = request;
    const payload = await this.request(request);

    const parsed = yahooChartResponseSchema.safeParse(payload);
    if (!parsed.success) throw new DataUnavailableError(`Unexpected chart response for ${symbol}`);

    const { result, error } = parsed.data.chart;
    if (error?.code === YAHOO_NOT_FOUND_CODE) throw new UnknownSymbolError(symbol);
    if (error?.description?.startsWith(YAHOO_NO_DATA_DESCRIPTION)) throw new NoPriceDataError(symbol, { start, end });
    if (error) throw new DataUnavailableError(`${error.code}: ${error.description ?? 'no description'}`);

    const chart = result?.[0];
    if (!chart) throw new UnknownSymbolError(symbol);

    const series = toPriceSeries(chart);
    if (!series.length) throw new NoPriceDataError(symbol, { start, end });

    debug(
      'price provider',
      `Fetched ${series.length} daily closes for ${symbol} (${toISODate(start)} -> ${toISODate(end)})`,
    );
    return series;
  }

  private async request(request: PriceSeriesRequest) {
    try {
      return await this.fetcher.get({ url: buildChartUrl(request), headers: { ...YAHOO_HEADERS } });
    } catch (err) {
      if (err instanceof FetcherError && err.status === 404) throw new UnknownSymbolError(request.symbol);
      // Other client errors carry a chart error payload, read like a successful answer
      if (isClientError(err)) return err.body;
      throw new PriceProviderNetworkError(request.symbol, err instanceof Error ? err.message : String(err));
    }
  }
}
