export type MarketplaceCode = string;

export interface UrlInfo {
  asin: string;
  country: MarketplaceCode;
}

export interface ProductRecord {
  asin: string;
  title: string | null;
  description: string;
  features: string[];
  photos: string[];
  mainImageUrl: string | null;
  attributes: Record<string, string> | null;
}

export interface ReviewSummary {
  positive: string[];
  negative: string[];
}

export interface CompetitorInfo {
  asin: string | null;
  title: string | null;
  price: string | null;
  rating: number | null;
  reviewsCount: number | null;
}

export type ServiceErrorKind =
  | 'invalid_url'
  | 'upstream_not_found'
  | 'upstream_unavailable'
  | 'generation_failed'
  | 'internal_error';

export interface AnalyzeResponse {
  report: string;
  asin: string;
  country: string;
  product_title?: string | null;
  product_image_url?: string | null;
  product_photos: string[];
  product_features: string[];
  error?: ServiceErrorKind;
}

export interface BatchAnalyzeResponse {
  results: AnalyzeResponse[];
}

export interface OptimizeResponse {
  optimized_listing_report: string;
  asin: string;
  country: string;
}

export type ReportImageMode = 'text' | 'inline';

export interface ProductApiConfig {
  apiKey: string;
  host: string;
  timeoutMs: number;
}

export interface LlmConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
}

export interface ReportConfig {
  imageMode: ReportImageMode;
  maxImages: number;
  language?: string;
}

export interface AppConfig {
  port: number;
  productApi: ProductApiConfig;
  llm: LlmConfig;
  report: ReportConfig;
}
