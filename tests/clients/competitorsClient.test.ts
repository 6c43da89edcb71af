import { beforeEach, describe, expect, it, vi } from 'vitest';

import { CompetitorsClient, selectCompetitors } from '../../src/clients/competitorsClient';
import { failingAdapter, jsonAdapter, RecordedRequest, TEST_API_CONFIG } from '../helpers/fakes';

function searchResult(asin: string, extra: Record<string, unknown> = {}) {
  return {
    asin,
    product_title: `Bottle ${asin}`,
    product_price: '$19.99',
    product_star_rating: '4.5',
    product_num_ratings: 1200,
    is_sponsored: false,
    ...extra,
  };
}

describe('selectCompetitors', () => {
  it('skips the product itself and sponsored entries, keeping the first five', () => {
    const products = [
      searchResult('B000000001', { is_sponsored: true }),
      searchResult('b08n5wrwnw'),
      searchResult('B000000002'),
      searchResult('B000000003'),
      searchResult('B000000004'),
      searchResult('B000000005'),
      searchResult('B000000006'),
      searchResult('B000000007'),
    ];

    const competitors = selectCompetitors(products, 'B08N5WRWNW');

    expect(competitors.map((competitor) => competitor.asin)).toEqual([
      'B000000002',
      'B000000003',
      'B000000004',
      'B000000005',
      'B000000006',
    ]);
    expect(competitors[0]).toEqual({
      asin: 'B000000002',
      title: 'Bottle B000000002',
      price: '$19.99',
      rating: 4.5,
      reviewsCount: 1200,
    });
  });
});

describe('selectCompetitors sponsored flag', () => {
  it('skips entries whose sponsored flag is any truthy value', () => {
    const products = [
      searchResult('B000000001', { is_sponsored: 1 }),
      searchResult('B000000002', { is_sponsored: 'true' }),
      searchResult('B000000003', { is_sponsored: 0 }),
      searchResult('B000000004', { is_sponsored: null }),
    ];

    expect(selectCompetitors(products, 'B08N5WRWNW').map((competitor) => competitor.asin)).toEqual([
      'B000000003',
      'B000000004',
    ]);
  });
});

describe('CompetitorsClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  it('searches by keyword with a page of 10 results', async () => {
    const requests: RecordedRequest[] = [];
    const client = new CompetitorsClient(TEST_API_CONFIG, {
      adapter: jsonAdapter({ data: { products: [searchResult('B000000002')] } }, requests),
    });

    const competitors = await client.searchCompetitors('Steel Water Bottle', 'US', 'B08N5WRWNW');

    expect(competitors).toHaveLength(1);
    expect(requests[0].url).toBe('/search');
    expect(requests[0].params).toEqual({ query: 'Steel Water Bottle', country: 'US', page_size: '10' });
  });

  it('degrades to an empty list when the call fails', async () => {
    const client = new CompetitorsClient(TEST_API_CONFIG, {
      adapter: failingAdapter('Request failed with status code 500', 'ERR_BAD_RESPONSE', 500),
    });

    await expect(client.searchCompetitors('Steel Water Bottle', 'US', 'B08N5WRWNW')).resolves.toEqual([]);
  });
});
