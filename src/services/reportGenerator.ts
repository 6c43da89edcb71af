import type { ChatCompletionContentPart } from 'openai/resources/chat/completions';

import { resolveMarketLocale } from '../config/markets';
import { describeError, ServiceError } from '../errors/serviceError';
import { PromptContent, TextGenerator } from '../llm/chatCompletionGenerator';
import { ProductRecord, ReportConfig } from '../types';

const NOT_AVAILABLE = 'N/A';

export const NO_INCONSISTENCIES_SENTENCE = 'No factual inconsistencies found.';

export function findDimensions(attributes: Record<string, string> | null): string {
  if (!attributes) {
    return NOT_AVAILABLE;
  }
  const entry = Object.entries(attributes).find(([key]) => key.toLowerCase().includes('dimens'));
  return entry ? entry[1] : NOT_AVAILABLE;
}

export function buildListingText(product: ProductRecord): string {
  const features = product.features.length > 0 ? product.features.join('\n- ') : NOT_AVAILABLE;
  return `${product.description}\n\nFeatures:\n- ${features}`.trim();
}

/** Textual report returned instead of a generation call when the product has no photos. */
export function buildNoImagesReport(product: ProductRecord): string {
  return [
    'No product images were returned by the Amazon data API, so no visual comparison was made.',
    '--- LISTING TEXT ---',
    `**Title:** ${product.title ?? NOT_AVAILABLE}`,
    `**Listing content:**\n${buildListingText(product)}`,
    `**Dimensions (text):** ${findDimensions(product.attributes)}`,
  ].join('\n');
}

function buildInstructions(product: ProductRecord, language: string): string {
  return [
    'You are a meticulous e-commerce QA analyst focused on numeric and technical data.',
    'Compare the LISTING TEXT of a product with its NUMBERED IMAGES and find factual contradictions, above all in dimensions, technical specifications, features, names and functions.',
    'Follow these steps:',
    '1. Analyze EACH image and extract every visible numeric specification (height, width, depth, weight, capacity, etc.).',
    '2. Compare the numbers taken from the images with the LISTING TEXT section.',
    '3. For every numeric contradiction, state the exact value from the text and the exact value from the image.',
    "4. You MUST cite the number of the image where each inconsistency appears (e.g. 'In Image 2...').",
    '5. Write a clear, concise report listing ALL discrepancies, grouped by type where possible, with a short explanation of why each one is a discrepancy.',
    'Discrepancies include:\n' +
      "- Contradictory information (e.g. the text says '10h battery', an image shows '8h battery').\n" +
      '- Features claimed in the text but not shown or supported by the images.\n' +
      '- Important features or text visible in the images but missing from the description.\n' +
      '- Technical details (dimensions, weight, material) in the images that disagree with the text.\n' +
      '- Any other error that could mislead a buyer.',
    `If everything is consistent, state: '${NO_INCONSISTENCIES_SENTENCE}'`,
    `Write the entire report in ${language}.`,
    '\n--- LISTING TEXT ---',
    `**Title:** ${product.title ?? NOT_AVAILABLE}`,
    `**Listing content:**\n${buildListingText(product)}`,
    `**Product dimensions (text):** ${findDimensions(product.attributes)}`,
    '\n--- IMAGES FOR VISUAL ANALYSIS (numbered from 1) ---',
  ].join('\n');
}

export function buildInconsistencyPrompt(
  product: ProductRecord,
  config: ReportConfig,
  language: string,
): PromptContent {
  const instructions = buildInstructions(product, language);
  const images = product.photos.slice(0, config.maxImages);

  if (config.imageMode === 'text') {
    const lines = images.map((url, index) => `Image ${index + 1}: ${url}`);
    return [instructions, ...lines].join('\n');
  }

  const parts: ChatCompletionContentPart[] = [{ type: 'text', text: instructions }];
  images.forEach((url, index) => {
    parts.push({ type: 'text', text: `Image ${index + 1}:` });
    parts.push({ type: 'image_url', image_url: { url } });
  });
  return parts;
}

export class ReportGenerator {
  constructor(
    private readonly generator: TextGenerator,
    private readonly config: ReportConfig,
  ) {}

  async generateInconsistencyReport(product: ProductRecord, country: string): Promise<string> {
    if (product.photos.length === 0) {
      console.warn(`[report] ${product.asin} has no photos, returning the text-only report`);
      return buildNoImagesReport(product);
    }

    const language = this.config.language ?? resolveMarketLocale(country).language;
    const prompt = buildInconsistencyPrompt(product, this.config, language);

    try {
      return await this.generator.generate(prompt);
    } catch (error) {
      console.error(`[report] generation failed for ${product.asin}:`, describeError(error));
      throw ServiceError.generationFailed(
        `Error calling the model for the analysis: ${describeError(error)}`,
      );
    }
  }
}
