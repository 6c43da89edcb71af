import express, { Express } from 'express';

import { CompetitorsClient } from './clients/competitorsClient';
import { ProductDataClient } from './clients/productDataClient';
import { ReviewsClient } from './clients/reviewsClient';
import { ChatCompletionGenerator, createOpenAIClient } from './llm/chatCompletionGenerator';
import { createAnalysisRouter } from './routes/analysis';
import { AnalysisService } from './services/analysisService';
import { ListingOptimizer } from './services/listingOptimizer';
import { ReportGenerator } from './services/reportGenerator';
import { AppConfig } from './types';

export function buildAnalysisService(config: AppConfig): AnalysisService {
  const generator = new ChatCompletionGenerator(createOpenAIClient(config.llm), config.llm.model);

  return new AnalysisService({
    products: new ProductDataClient(config.productApi),
    reviews: new ReviewsClient(config.productApi),
    competitors: new CompetitorsClient(config.productApi),
    reportGenerator: new ReportGenerator(generator, config.report),
    listingOptimizer: new ListingOptimizer(generator),
  });
}

export function createApp(service: AnalysisService): Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use('/', createAnalysisRouter(service));

  app.get('/', (_req, res) => {
    res.json({ status: 'ok', message: 'Listing Inspector API is running' });
  });

  return app;
}
