import 'dotenv/config';
import fs from 'fs/promises';
import path from 'path';
import dayjs from 'dayjs';
import { loadConfig } from './config.js';
import { DatasetIndex } from './dataset/datasetIndex.js';
import { createLogger } from './logger.js';
import { loadCompletedRuns } from './manager/resultsLoader.js';
import { buildResultsCsv, buildResultsMarkdown } from './reports/resultsTable.js';

async function main(): Promise<void> {
  const config = await loadConfig();
  const logger = createLogger('export', { level: config.logLevel });
  const index = new DatasetIndex(config.datasetFile, { logger });
  await index.load();

  const { summaries, failures } = await loadCompletedRuns(config.paths.resultsDir, index, config.readRetry);
  for (const failure of failures) {
    logger.warn({ path: failure.filePath, reason: failure.error.message }, 'export.result.skipped');
  }
  if (summaries.length === 0) {
    logger.warn({ resultsDir: config.paths.resultsDir }, 'No result files to export');
    return;
  }

  await fs.mkdir(config.exportDir, { recursive: true });
  const isoDate = dayjs().format('YYYY-MM-DD');
  const csvPath = path.join(config.exportDir, `results_${isoDate}.csv`);
  const markdownPath = path.join(config.exportDir, `results_${isoDate}.md`);
  await fs.writeFile(csvPath, buildResultsCsv(summaries), 'utf-8');
  await fs.writeFile(markdownPath, buildResultsMarkdown(summaries), 'utf-8');
  logger.info({ csvPath, markdownPath, runs: summaries.length }, 'Results exported');
}

main().catch((error) => {
  const detail = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(
    JSON.stringify({
      ts: new Date().toISOString(),
      level: 'error',
      msg: 'export.failed',
      detail
    })
  );
  process.exit(1);
});
