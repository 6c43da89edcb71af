import { ProductApiConfig, ReviewSummary } from '../types';
import { isRecord, readNumber, readRecordArray, readString, UnknownRecord } from '../utils/records';
import { ApiClientOptions, BaseApiClient } from './baseApiClient';

export const MAX_REVIEWS_PER_BUCKET = 10;
const POSITIVE_MIN_RATING = 4;
const NEGATIVE_MAX_RATING = 2;

export interface ReviewSource {
  getProductReviews(asin: string, country: string): Promise<ReviewSummary>;
}

export function emptyReviewSummary(): ReviewSummary {
  return { positive: [], negative: [] };
}

export function bucketReviews(reviews: UnknownRecord[]): ReviewSummary {
  const summary = emptyReviewSummary();

  for (const review of reviews) {
    const rating = readNumber(review, 'review_star_rating');
    const comment = readString(review, 'review_comment');
    if (rating === null || !comment) {
      continue;
    }

    if (rating >= POSITIVE_MIN_RATING) {
      summary.positive.push(comment);
    } else if (rating <= NEGATIVE_MAX_RATING) {
      summary.negative.push(comment);
    }
  }

  return {
    positive: summary.positive.slice(0, MAX_REVIEWS_PER_BUCKET),
    negative: summary.negative.slice(0, MAX_REVIEWS_PER_BUCKET),
  };
}

export class ReviewsClient extends BaseApiClient implements ReviewSource {
  constructor(config: ProductApiConfig, options?: ApiClientOptions) {
    super('reviews', config, options);
  }

  async getProductReviews(asin: string, country: string): Promise<ReviewSummary> {
    try {
      const body = await this.getJson('/product-reviews', {
        asin,
        country,
        sort_by: 'recent',
        page_size: '20',
      });
      const data = isRecord(body.data) ? body.data : {};
      return bucketReviews(readRecordArray(data, 'reviews'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[${this.name}] could not load reviews for ${asin}, continuing without them: ${message}`);
      return emptyReviewSummary();
    }
  }
}
