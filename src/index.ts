#!/usr/bin/env node
/**
 * @fileoverview Command entry point: fetch recently approved drugs, resolve
 * their targets, fetch target keywords and write the two CSV reports.
 * @module src/index
 */
import 'reflect-metadata';

import { loadConfig } from '@/config/index.js';
import { container, DrugTargetService, registerAll } from '@/container/index.js';
import type { DrugTargetService as DrugTargetServiceClass } from '@/services/drug-targets/index.js';
import { writeReports } from '@/services/reports/csv-writer.js';
import { logger, requestContextService } from '@/utils/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  registerAll(config);

  const context = requestContextService.createRequestContext({
    operation: 'main',
  });

  const service = container.resolve<DrugTargetServiceClass>(DrugTargetService);
  const result = await service.run(context);
  const paths = await writeReports(result, config.outputDir, context);

  logger.notice(
    `Processing complete. Results saved to ${paths.drugTargets} and ${paths.targetKeywords}`,
    {
      ...context,
      failedDrugs: result.failedDrugs,
    },
  );
}

main().catch((error: unknown) => {
  logger.crit('Fatal error in pipeline', { error });
  process.exitCode = 1;
});
