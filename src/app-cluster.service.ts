import { Logger } from '@nestjs/common';
import cluster from 'cluster';
import appConfig from './config/app.config';

/**
 * Forks `CLUSTER_WORKERS` copies of the server. Each worker loads its own
 * model and opens its own database pool; with a single worker the server
 * runs in the current process.
 */
export class AppClusterService {
  private static readonly logger = new Logger(AppClusterService.name);

  static clusterize(bootstrap: () => Promise<void>): void {
    const workers = Math.max(1, appConfig().clusterWorkers);

    if (workers === 1 || !cluster.isPrimary) {
      bootstrap().catch((error: unknown) => {
        AppClusterService.logger.error(
          `Server failed to start: ${error instanceof Error ? error.stack ?? error.message : String(error)}`,
        );
        process.exit(1);
      });
      return;
    }

    AppClusterService.logger.log(`Primary ${process.pid} starting ${workers} workers`);
    for (let i = 0; i < workers; i++) {
      cluster.fork();
    }
    cluster.on('exit', (worker, code, signal) => {
      AppClusterService.logger.warn(
        `Worker ${worker.process.pid} exited (${signal ?? code}), starting a replacement`,
      );
      cluster.fork();
    });
  }
}
