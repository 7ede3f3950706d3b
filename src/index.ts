#!/usr/bin/env node
import { defaultDependencies, run } from './cli';
import { errorMessage } from './models/download-error';
import { Logger } from './services/logger.service';

function setupSignalHandlers(logger: Logger): void {
  const shutdown = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, aborting...`);
    void logger.close().then(() => process.exit(130));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Promise Rejection: ${errorMessage(reason)}`);
  });
}

async function main(): Promise<void> {
  const code = await run(process.argv.slice(2), {
    ...defaultDependencies,
    createLogger: options => {
      const logger = new Logger(options);
      setupSignalHandlers(logger);
      return logger;
    }
  });
  process.exit(code);
}

// Start the application
main().catch(error => {
  console.error('Fatal error:', error);
  process.exit(1);
});
