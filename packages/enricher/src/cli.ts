#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadEnv } from './config/env';
import { AppError } from './shared/errors';
import { errorMessage, logger, setLogLevel } from './shared/logger';
import { createApp } from './app';
import { createApolloAdapter } from './modules/enrichment/adapters/apollo.adapter';

// Load .env file before validation
dotenv.config();

async function main(): Promise<number> {
  const env = loadEnv();
  setLogLevel(env.LOG_LEVEL);

  const gateway = createApolloAdapter({
    apiKey: env.APOLLO_API_KEY,
    baseUrl: env.APOLLO_BASE_URL,
    timeoutMs: env.APOLLO_TIMEOUT_MS,
  });

  const app = createApp(
    {
      inputFile: env.INPUT_FILE,
      outputFile: env.OUTPUT_FILE,
      unlockCreditCost: env.MOBILE_UNLOCK_CREDIT_COST,
    },
    gateway,
  );

  const result = await app.run();
  if (result) {
    logger.info('Results exported', {
      profilesProcessed: result.summary.processed,
      simulatedCreditsUsed: result.creditsSpent,
      outputFile: result.outputFile,
    });
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof AppError) {
      logger.error(err.message, { code: err.code });
      process.exitCode = err.exitCode;
      return;
    }
    logger.error('Enrichment run failed', { error: errorMessage(err) });
    process.exitCode = 1;
  });
