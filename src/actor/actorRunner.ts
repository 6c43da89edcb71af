import { z } from 'zod';

import { describeError, errorKindOf } from '../errors/serviceError';
import { AnalysisService } from '../services/analysisService';
import { AnalyzeResponse, OptimizeResponse, ServiceErrorKind } from '../types';

export const actorInputSchema = z.object({
  amazonUrls: z.array(z.string()).optional(),
  amazonUrl: z.string().optional(),
  mode: z.enum(['analyze', 'optimize']).optional(),
  model: z.string().trim().min(1).optional(),
});

export type ActorInput = z.infer<typeof actorInputSchema>;

export type OptimizeItem =
  | ({ status: 'ok'; url: string } & OptimizeResponse)
  | { status: 'error'; url: string; error: ServiceErrorKind; message: string };

export type ActorItem = AnalyzeResponse | OptimizeItem;

export function parseActorInput(raw: unknown): ActorInput {
  const parsed = actorInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid actor input: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return parsed.data;
}

export function parseActorInputJson(raw: string): ActorInput {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Failed to parse APIFY_INPUT env var as JSON: ${describeError(error)}`);
  }
  return parseActorInput(json);
}

export function collectUrls(input: ActorInput): string[] {
  const urls = [...(input.amazonUrls ?? []), ...(input.amazonUrl ? [input.amazonUrl] : [])];
  return urls.map((url) => url.trim()).filter((url) => url.length > 0);
}

export async function runOptimizeBatch(service: AnalysisService, urls: string[]): Promise<OptimizeItem[]> {
  return Promise.all(
    urls.map(async (url): Promise<OptimizeItem> => {
      try {
        return { status: 'ok', url, ...(await service.optimize(url)) };
      } catch (error) {
        return {
          status: 'error',
          url,
          error: errorKindOf(error),
          message: describeError(error),
        };
      }
    }),
  );
}

/** Runs every URL through the selected pipeline and returns one dataset item per URL. */
export async function runActor(service: AnalysisService, input: ActorInput): Promise<ActorItem[]> {
  const urls = collectUrls(input);
  if (urls.length === 0) {
    throw new Error('amazonUrls (or amazonUrl) is required');
  }

  if (input.mode === 'optimize') {
    const items = await runOptimizeBatch(service, urls);
    const failed = items.filter((item) => item.status === 'error').length;
    console.log(`[actor] mode=optimize urls=${urls.length} failed=${failed}`);
    return items;
  }

  const { results } = await service.batchAnalyze(urls);
  const failed = results.filter((result) => result.error).length;
  console.log(`[actor] mode=analyze urls=${urls.length} failed=${failed}`);
  return results;
}
