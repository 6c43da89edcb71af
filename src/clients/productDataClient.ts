import { isAxiosError } from 'axios';

import { ServiceError } from '../errors/serviceError';
import { ProductApiConfig, ProductRecord } from '../types';
import {
  isRecord,
  readString,
  readStringArray,
  readStringRecord,
  UnknownRecord,
} from '../utils/records';
import { ApiClientOptions, BaseApiClient } from './baseApiClient';

// The photo list has moved between fields across provider versions.
export const PHOTO_FIELD_CANDIDATES = ['product_photos', 'product_images', 'images', 'photos'] as const;

const ATTRIBUTE_FIELD_CANDIDATES = ['product_information', 'product_details'] as const;

export interface ProductDetailsSource {
  getProductDetails(asin: string, country: string): Promise<ProductRecord>;
}

export function pickPhotos(data: UnknownRecord): string[] {
  for (const field of PHOTO_FIELD_CANDIDATES) {
    const photos = readStringArray(data, field);
    if (photos.length > 0) {
      return photos;
    }
  }
  return [];
}

function pickAttributes(data: UnknownRecord): Record<string, string> | null {
  for (const field of ATTRIBUTE_FIELD_CANDIDATES) {
    const attributes = readStringRecord(data, field);
    if (attributes) {
      return attributes;
    }
  }
  return null;
}

export function toProductRecord(asin: string, data: UnknownRecord): ProductRecord {
  const photos = pickPhotos(data);
  return {
    asin,
    title: readString(data, 'product_title'),
    description: readString(data, 'product_description') ?? '',
    features: readStringArray(data, 'about_product'),
    photos,
    mainImageUrl: readString(data, 'product_main_image_url') ?? photos[0] ?? null,
    attributes: pickAttributes(data),
  };
}

export class ProductDataClient extends BaseApiClient implements ProductDetailsSource {
  constructor(config: ProductApiConfig, options?: ApiClientOptions) {
    super('product-data', config, options);
  }

  async getProductDetails(asin: string, country: string): Promise<ProductRecord> {
    let body: UnknownRecord;
    try {
      body = await this.getJson('/product-details', { asin, country });
    } catch (error) {
      throw this.toUnavailable(asin, error);
    }

    const data = body.data;
    if (!isRecord(data) || Object.keys(data).length === 0) {
      console.warn(`[${this.name}] no product data for ${asin} (${country})`);
      throw ServiceError.notFound(`Product ${asin} was not found in the Amazon data API.`);
    }

    return toProductRecord(asin, data);
  }

  private toUnavailable(asin: string, error: unknown): ServiceError {
    if (isAxiosError(error)) {
      const status = error.response?.status;
      const detail = status ? `status ${status}` : error.message;
      console.warn(`[${this.name}] request for ${asin} failed: ${detail}`);
      return ServiceError.unavailable(
        `Error calling the Amazon data API for product details: ${detail}`,
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(`[${this.name}] unexpected error for ${asin}:`, message);
    return ServiceError.unavailable(`Error calling the Amazon data API for product details: ${message}`);
  }
}
