import { Actor } from 'apify';
import dotenv from 'dotenv';

import { ActorInput, parseActorInput, parseActorInputJson, runActor } from './actor/actorRunner';
import { buildAnalysisService } from './app';
import { buildAppConfig } from './config/appConfig';

dotenv.config();

async function readInput(): Promise<ActorInput> {
  const input = await Actor.getInput<unknown>();
  if (input) {
    return parseActorInput(input);
  }

  const raw = process.env.APIFY_INPUT;
  if (raw && raw.trim().length > 0) {
    return parseActorInputJson(raw);
  }

  return {};
}

Actor.main(async () => {
  const input = await readInput();
  const config = buildAppConfig(process.env, input.model ? { llmModel: input.model } : {});
  const items = await runActor(buildAnalysisService(config), input);

  await Actor.pushData(items.map((item) => ({ ...item })));
});
