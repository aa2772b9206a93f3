import { setupLogger } from '@shared/utils/logger';
import { main } from './index';

const logger = setupLogger('power-control:cli');

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.fatal({ error: String(error) }, 'Unhandled error');
    process.exitCode = 1;
  }
);
