import { INestApplicationContext, Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/lib/util';

export function setupGracefulShutdown(app: INestApplicationContext): void {
  const logger = new Logger('GracefulShutdown');
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  let closing = false;

  signals.forEach((signal) => {
    process.on(signal, () => {
      if (closing) return;
      closing = true;
      logger.log(`${signal} received: closing application...`);

      app
        .close()
        .then(() => {
          logger.log('Application closed gracefully.');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error(`Error during graceful shutdown: ${errorMessage(err)}`);
          process.exit(1);
        });
    });
  });
}
