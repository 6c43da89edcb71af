import { AppConfig, ReportImageMode } from '../types';

export const DEFAULT_PRODUCT_API_HOST = 'real-time-amazon-data.p.rapidapi.com';
export const DEFAULT_LLM_BASE_URL = 'https://openrouter.ai/api/v1';
export const DEFAULT_LLM_MODEL = 'google/gemini-2.5-pro';
export const MAX_REPORT_IMAGES = 5;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface AppConfigOverrides {
  imageMode?: ReportImageMode;
  llmModel?: string;
}

function parseImageMode(raw: string): ReportImageMode {
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'text' || normalized === 'inline') {
    return normalized;
  }
  throw new ConfigError(`REPORT_IMAGE_MODE must be "text" or "inline", got "${raw}"`);
}

export function buildAppConfig(
  env: NodeJS.ProcessEnv,
  overrides: AppConfigOverrides = {},
): AppConfig {
  const {
    PORT = '3000',
    RAPIDAPI_KEY = '',
    RAPIDAPI_HOST = DEFAULT_PRODUCT_API_HOST,
    PRODUCT_API_TIMEOUT = '30000',
    OPENROUTER_API_KEY = '',
    LLM_BASE_URL = DEFAULT_LLM_BASE_URL,
    LLM_MODEL = DEFAULT_LLM_MODEL,
    REPORT_IMAGE_MODE = 'text',
    REPORT_LANGUAGE,
  } = env;

  const missing = [
    RAPIDAPI_KEY.trim() ? null : 'RAPIDAPI_KEY',
    OPENROUTER_API_KEY.trim() ? null : 'OPENROUTER_API_KEY',
  ].filter((name): name is string => name !== null);

  if (missing.length > 0) {
    throw new ConfigError(`Missing required API keys: ${missing.join(', ')}. Check your .env file.`);
  }

  const language = REPORT_LANGUAGE?.trim();

  const config: AppConfig = {
    port: Number(PORT) || 3000,
    productApi: {
      apiKey: RAPIDAPI_KEY.trim(),
      host: RAPIDAPI_HOST,
      timeoutMs: Number(PRODUCT_API_TIMEOUT) || 30000,
    },
    llm: {
      apiKey: OPENROUTER_API_KEY.trim(),
      baseUrl: LLM_BASE_URL,
      model: overrides.llmModel ?? LLM_MODEL,
    },
    report: {
      imageMode: overrides.imageMode ?? parseImageMode(REPORT_IMAGE_MODE),
      maxImages: MAX_REPORT_IMAGES,
      ...(language ? { language } : {}),
    },
  };

  return config;
}
