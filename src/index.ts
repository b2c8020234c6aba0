import { getConfig } from './config/index.js';
import { startServer } from './api/server.js';
import { createChildLogger } from './utils/logger.js';

const logger = createChildLogger('main');

async function main() {
  try {
    const config = getConfig();

    logger.info({ port: config.server.port, dataDir: config.dataDir }, 'Starting regulatory metrics server');

    await startServer(config);
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

void main();
