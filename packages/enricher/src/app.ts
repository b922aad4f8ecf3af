import { logger } from './shared/logger';
import type { EnrichmentGateway } from './modules/enrichment/adapters/types';
import { readInputs } from './modules/batch/input-reader';
import { runBatch, type BatchSummary } from './modules/batch/batch.runner';
import { exportRowsToCsv } from './modules/export/csv-exporter';

export interface AppConfig {
  inputFile: string;
  outputFile: string;
  unlockCreditCost: number;
}

export interface AppRunResult {
  summary: BatchSummary;
  creditsSpent: number;
  outputFile: string;
}

export interface App {
  /**
   * Reads the input file, enriches every URL and writes the CSV.
   * Resolves to null, writing nothing, when there is no input.
   */
  run(): Promise<AppRunResult | null>;
}

export function createApp(config: AppConfig, gateway: EnrichmentGateway): App {
  return {
    async run() {
      const linkedinUrls = await readInputs(config.inputFile);
      if (linkedinUrls.length === 0) {
        logger.warn('No LinkedIn URLs to process', { inputFile: config.inputFile });
        return null;
      }

      logger.info('Starting enrichment batch', {
        inputFile: config.inputFile,
        profiles: linkedinUrls.length,
      });

      const { rows, creditsSpent, summary } = await runBatch(gateway, linkedinUrls, {
        unlockCreditCost: config.unlockCreditCost,
      });

      await exportRowsToCsv(rows, config.outputFile);

      logger.info('Enrichment batch complete', {
        ...summary,
        creditsSpent,
        outputFile: config.outputFile,
      });

      return { summary, creditsSpent, outputFile: config.outputFile };
    },
  };
}
