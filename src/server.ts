import dotenv from 'dotenv';

import { buildAnalysisService, createApp } from './app';
import { buildAppConfig } from './config/appConfig';
import { AppConfig } from './types';

dotenv.config();

function loadConfig(): AppConfig {
  try {
    return buildAppConfig(process.env);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[server] refusing to start: ${message}`);
    process.exit(1);
  }
}

const appConfig = loadConfig();
const app = createApp(buildAnalysisService(appConfig));

app.listen(appConfig.port, () => {
  console.log(
    `[server] listening on port ${appConfig.port} (model ${appConfig.llm.model}, images as ${appConfig.report.imageMode})`,
  );
});
