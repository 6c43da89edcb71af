import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { vi } from 'vitest';

import { CompetitorSource } from '../../src/clients/competitorsClient';
import { ProductDetailsSource } from '../../src/clients/productDataClient';
import { ReviewSource } from '../../src/clients/reviewsClient';
import { ServiceError } from '../../src/errors/serviceError';
import { PromptContent, TextGenerator } from '../../src/llm/chatCompletionGenerator';
import { AnalysisService } from '../../src/services/analysisService';
import { ListingOptimizer } from '../../src/services/listingOptimizer';
import { ReportGenerator } from '../../src/services/reportGenerator';
import { CompetitorInfo, ProductApiConfig, ProductRecord, ReportConfig, ReviewSummary } from '../../src/types';

export const TEST_API_CONFIG: ProductApiConfig = {
  apiKey: 'test-key',
  host: 'real-time-amazon-data.p.rapidapi.com',
  timeoutMs: 30000,
};

export const TEXT_REPORT_CONFIG: ReportConfig = { imageMode: 'text', maxImages: 5 };

export function makeProduct(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    asin: 'B0TEST0001',
    title: 'Steel Water Bottle 750ml',
    description: 'Double-wall insulated bottle.',
    features: ['Keeps drinks cold for 24 hours', 'Leak-proof lid'],
    photos: ['https://img.example.com/1.jpg', 'https://img.example.com/2.jpg'],
    mainImageUrl: 'https://img.example.com/main.jpg',
    attributes: { 'Product Dimensions': '7 x 7 x 26 cm' },
    ...overrides,
  };
}

export interface RecordedRequest {
  url?: string;
  params: unknown;
  config: InternalAxiosRequestConfig;
}

/** Axios adapter answering every request with the given body, recording each call. */
export function jsonAdapter(body: unknown, requests: RecordedRequest[] = []): AxiosAdapter {
  return async (config) => {
    requests.push({ url: config.url, params: config.params, config });
    return { data: body, status: 200, statusText: 'OK', headers: {}, config };
  };
}

export function failingAdapter(message: string, code: string, status?: number): AxiosAdapter {
  return async (config) => {
    const response = status
      ? { data: {}, status, statusText: 'Error', headers: {}, config }
      : undefined;
    throw new AxiosError(message, code, config, undefined, response);
  };
}

export class FakeGenerator implements TextGenerator {
  readonly prompts: PromptContent[] = [];

  constructor(private readonly reply: (prompt: PromptContent) => string = () => 'generated report') {}

  async generate(content: PromptContent): Promise<string> {
    this.prompts.push(content);
    return this.reply(content);
  }
}

export class FakeProducts implements ProductDetailsSource {
  readonly calls: Array<{ asin: string; country: string }> = [];

  constructor(
    private readonly products: Record<string, ProductRecord | ServiceError>,
    private readonly delays: Record<string, number> = {},
  ) {}

  async getProductDetails(asin: string, country: string): Promise<ProductRecord> {
    this.calls.push({ asin, country });
    const delay = this.delays[asin] ?? 0;
    if (delay > 0) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    const entry = this.products[asin];
    if (!entry) {
      throw ServiceError.notFound(`Product ${asin} was not found in the Amazon data API.`);
    }
    if (entry instanceof ServiceError) {
      throw entry;
    }
    return entry;
  }
}

export function fakeReviews(summary: ReviewSummary) {
  return {
    getProductReviews: vi.fn(async (_asin: string, _country: string) => summary),
  };
}

export function fakeCompetitors(competitors: CompetitorInfo[]) {
  return {
    searchCompetitors: vi.fn(async (_keyword: string, _country: string, _excludeAsin: string) => competitors),
  };
}

export function buildService(
  products: ProductDetailsSource,
  generator: TextGenerator = new FakeGenerator(),
  reviews: ReviewSource = fakeReviews({ positive: [], negative: [] }),
  competitors: CompetitorSource = fakeCompetitors([]),
): AnalysisService {
  return new AnalysisService({
    products,
    reviews,
    competitors,
    reportGenerator: new ReportGenerator(generator, TEXT_REPORT_CONFIG),
    listingOptimizer: new ListingOptimizer(generator),
  });
}
