import { CompetitorSource } from '../clients/competitorsClient';
import { ProductDetailsSource } from '../clients/productDataClient';
import { ReviewSource } from '../clients/reviewsClient';
import { describeError, errorKindOf, ServiceError } from '../errors/serviceError';
import {
  AnalyzeResponse,
  BatchAnalyzeResponse,
  OptimizeResponse,
  ProductRecord,
  UrlInfo,
} from '../types';
import { extractUrlInfo } from '../utils/asinExtractor';
import { ListingOptimizer } from './listingOptimizer';
import { ReportGenerator } from './reportGenerator';

export interface AnalysisDependencies {
  products: ProductDetailsSource;
  reviews: ReviewSource;
  competitors: CompetitorSource;
  reportGenerator: ReportGenerator;
  listingOptimizer: ListingOptimizer;
}

export const ERROR_ASIN = 'ERROR';
export const UNKNOWN_COUNTRY = 'N/A';

function toAnalyzeResponse(urlInfo: UrlInfo, product: ProductRecord, report: string): AnalyzeResponse {
  return {
    report,
    asin: urlInfo.asin,
    country: urlInfo.country,
    product_title: product.title,
    product_image_url: product.mainImageUrl,
    product_photos: product.photos,
    product_features: product.features,
  };
}

export class AnalysisService {
  constructor(private readonly deps: AnalysisDependencies) {}

  parseUrl(url: string): UrlInfo {
    const urlInfo = extractUrlInfo(url);
    if (!urlInfo) {
      throw ServiceError.invalidUrl(url);
    }
    return urlInfo;
  }

  /** Single-URL analysis; rejects with the first ServiceError met. */
  async analyze(url: string): Promise<AnalyzeResponse> {
    const urlInfo = this.parseUrl(url);
    const product = await this.deps.products.getProductDetails(urlInfo.asin, urlInfo.country);
    const report = await this.deps.reportGenerator.generateInconsistencyReport(
      product,
      urlInfo.country,
    );
    return toAnalyzeResponse(urlInfo, product, report);
  }

  /** Like analyze, but every failure comes back as an error-shaped response. */
  async analyzeSafely(url: string): Promise<AnalyzeResponse> {
    try {
      return await this.analyze(url);
    } catch (error) {
      const urlInfo = extractUrlInfo(url);
      const kind = errorKindOf(error);
      console.warn(`[analysis] ${url} failed (${kind}): ${describeError(error)}`);

      return {
        report: urlInfo
          ? `Error processing product with ASIN ${urlInfo.asin}: ${describeError(error)}`
          : 'Error: invalid URL or no ASIN found in the URL provided.',
        asin: urlInfo?.asin ?? ERROR_ASIN,
        country: urlInfo?.country ?? UNKNOWN_COUNTRY,
        product_title: `Failed to process URL: ${url}`,
        product_photos: [],
        product_features: [],
        error: kind,
      };
    }
  }

  // No cap on fan-out: every URL in the batch is started at once.
  async batchAnalyze(urls: string[]): Promise<BatchAnalyzeResponse> {
    const results = await Promise.all(urls.map((url) => this.analyzeSafely(url)));
    return { results };
  }

  async optimize(url: string): Promise<OptimizeResponse> {
    const { asin, country } = this.parseUrl(url);
    const product = await this.deps.products.getProductDetails(asin, country);

    const keyword = product.title || asin;
    const [reviews, competitors] = await Promise.all([
      this.deps.reviews.getProductReviews(asin, country),
      this.deps.competitors.searchCompetitors(keyword, country, asin),
    ]);

    const report = await this.deps.listingOptimizer.optimizeListing(
      product,
      reviews,
      competitors,
      country,
    );

    return { optimized_listing_report: report, asin, country };
  }
}
