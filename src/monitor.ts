import 'dotenv/config';
import { loadConfig } from './config.js';
import { DatasetIndex } from './dataset/datasetIndex.js';
import { createLogger } from './logger.js';
import { StateManager } from './manager/stateManager.js';
import { createMonitorMetrics } from './metrics/monitor.js';
import { runProgress } from './stats/progress.js';

async function main(): Promise<void> {
  const config = await loadConfig();
  const logger = createLogger('monitor', { level: config.logLevel });
  const metrics = createMonitorMetrics({ promPort: config.promPort, collectDefaults: true });
  const manager = new StateManager({
    baseDir: config.paths.baseDir,
    resultsDir: config.paths.resultsDir,
    datasetIndex: new DatasetIndex(config.datasetFile, { logger }),
    pollIntervalMs: config.pollIntervalMs,
    readRetry: config.readRetry,
    watch: config.watchEnabled,
    logger,
    metrics
  });

  manager.onRunStateChange((run) => {
    const progress = runProgress(run);
    logger.info(
      {
        model: run.model,
        architecture: run.architecture,
        status: run.status,
        question: run.currentQuestion?.questionId ?? null,
        completed: progress.completed,
        total: progress.total,
        inputTokens: run.totalInputTokens,
        outputTokens: run.totalOutputTokens
      },
      'run.changed'
    );
  });
  manager.onLauncherStateChange((launcher) => {
    logger.info(
      {
        currentIndex: launcher.currentIndex,
        items: launcher.grid.length,
        finished: launcher.finishedAt !== null
      },
      'launcher.changed'
    );
  });
  manager.onCheckpointChange((checkpoint) => {
    logger.info(
      { lastCompletedIndex: checkpoint.lastCompletedIndex, totalItems: checkpoint.totalItems },
      'checkpoint.changed'
    );
  });
  manager.onResultsChange((summaries) => {
    const best = summaries[0];
    logger.info(
      { runs: summaries.length, best: best ? `${best.model}/${best.architecture}` : null, score: best?.score ?? null },
      'results.changed'
    );
  });

  await metrics.start();
  await manager.start();

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'monitor.shutdown');
    Promise.all([manager.stop(), metrics.stop()])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error({ err: error }, 'monitor.shutdown.failed');
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error) => {
  const detail = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(
    JSON.stringify({
      ts: new Date().toISOString(),
      level: 'error',
      msg: 'monitor.failed',
      detail
    })
  );
  process.exit(1);
});
