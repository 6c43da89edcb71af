import { resolveMarketLocale } from '../config/markets';
import { describeError, ServiceError } from '../errors/serviceError';
import { TextGenerator } from '../llm/chatCompletionGenerator';
import { CompetitorInfo, ProductRecord, ReviewSummary } from '../types';

export const LISTING_SECTIONS = [
  '### 1. Optimized Title (SEO)\n[Write the optimized title here]',
  '### 2. Optimized Feature Bullets (5 Points)\n[Write the 5 feature bullets here, one per line]',
  '### 3. Product Description (A+ Content Structure)\n[Write the persuasive description here]',
  '### 4. Competitive Analysis and Strategy\n[Write the comparison table and the strategy paragraph here]',
  '### 5. Keyword Suggestions (Backend)\n[Write the list of 15-20 long-tail keywords here]',
  '### 6. Strategic FAQ (Top 5 Questions and Answers)\n[Write the 5 Q&As here]',
] as const;

function formatList(items: string[]): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join('\n') : '- none';
}

function formatCompetitors(competitors: CompetitorInfo[]): string {
  if (competitors.length === 0) {
    return '- none found';
  }
  return competitors
    .map(
      (competitor, index) =>
        `${index + 1}. ${competitor.title ?? 'Untitled'} | price: ${competitor.price ?? 'N/A'} | rating: ${
          competitor.rating ?? 'N/A'
        } | ratings count: ${competitor.reviewsCount ?? 'N/A'}`,
    )
    .join('\n');
}

export function buildOptimizationPrompt(
  product: ProductRecord,
  reviews: ReviewSummary,
  competitors: CompetitorInfo[],
  country: string,
): string {
  const { language, marketName } = resolveMarketLocale(country);

  return [
    `You are a senior e-commerce consultant and an expert in Amazon SEO (A9, Rufus). Your mission is to optimize a listing to maximize sales in the ${marketName} marketplace.`,
    `The answer MUST be written entirely in ${language}.`,
    '--- CURRENT PRODUCT DATA ---',
    `Title: ${product.title ?? 'N/A'}`,
    `Features:\n${formatList(product.features)}`,
    '--- MARKET INTELLIGENCE ---',
    `Positive reviews:\n${formatList(reviews.positive)}`,
    `Negative reviews:\n${formatList(reviews.negative)}`,
    `Competitors:\n${formatCompetitors(competitors)}`,
    '\n--- INSTRUCTIONS AND REQUIRED OUTPUT FORMAT ---',
    'Answer STRICTLY with the Markdown structure below without leaving out any section. Use the headings exactly as written.',
    ...LISTING_SECTIONS,
    '\n--- RULES ---',
    '- Do not invent attributes. Use only the data provided above.\n' +
      '- Avoid generic cliches. Be specific and factual.\n' +
      '- The final content must be original and stronger than the competitors.',
  ].join('\n');
}

export class ListingOptimizer {
  constructor(private readonly generator: TextGenerator) {}

  async optimizeListing(
    product: ProductRecord,
    reviews: ReviewSummary,
    competitors: CompetitorInfo[],
    country: string,
  ): Promise<string> {
    const prompt = buildOptimizationPrompt(product, reviews, competitors, country);

    try {
      return await this.generator.generate(prompt);
    } catch (error) {
      console.error(`[optimizer] generation failed for ${product.asin}:`, describeError(error));
      throw ServiceError.generationFailed(
        `Error calling the model for the optimization: ${describeError(error)}`,
      );
    }
  }
}
