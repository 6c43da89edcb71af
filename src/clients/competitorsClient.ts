import { CompetitorInfo, ProductApiConfig } from '../types';
import { isRecord, readNumber, readRecordArray, readString, UnknownRecord } from '../utils/records';
import { ApiClientOptions, BaseApiClient } from './baseApiClient';

export const MAX_COMPETITORS = 5;

export interface CompetitorSource {
  searchCompetitors(keyword: string, country: string, excludeAsin: string): Promise<CompetitorInfo[]>;
}

export function selectCompetitors(products: UnknownRecord[], excludeAsin: string): CompetitorInfo[] {
  const excluded = excludeAsin.toUpperCase();
  const competitors: CompetitorInfo[] = [];

  for (const product of products) {
    if (competitors.length >= MAX_COMPETITORS) {
      break;
    }

    const asin = readString(product, 'asin');
    if (asin?.toUpperCase() === excluded || Boolean(product.is_sponsored)) {
      continue;
    }

    competitors.push({
      asin,
      title: readString(product, 'product_title'),
      price: readString(product, 'product_price'),
      rating: readNumber(product, 'product_star_rating'),
      reviewsCount: readNumber(product, 'product_num_ratings'),
    });
  }

  return competitors;
}

export class CompetitorsClient extends BaseApiClient implements CompetitorSource {
  constructor(config: ProductApiConfig, options?: ApiClientOptions) {
    super('competitors', config, options);
  }

  async searchCompetitors(
    keyword: string,
    country: string,
    excludeAsin: string,
  ): Promise<CompetitorInfo[]> {
    try {
      const body = await this.getJson('/search', {
        query: keyword,
        country,
        page_size: '10',
      });
      const data = isRecord(body.data) ? body.data : {};
      return selectCompetitors(readRecordArray(data, 'products'), excludeAsin);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[${this.name}] competitor search failed for "${keyword}", continuing without it: ${message}`);
      return [];
    }
  }
}
