import { loadConfig } from './config/config';
import logger from './utils/logger';
import { createApp } from './app';
import { createContainer, createSheetsRepositories } from './services/container';

const hintForBootstrapError = (error: unknown): string | undefined => {
  const message = error instanceof Error ? error.message : undefined;
  if (!message) {
    return undefined;
  }
  if (message.includes('Unable to parse range')) {
    return 'Expected sheets were not found in the spreadsheet. Run "npm run seed:sheets" to create them.';
  }
  if (message.includes('The caller does not have permission')) {
    return 'The service account cannot access the spreadsheet. Share it with the service account e-mail (Editor).';
  }
  return undefined;
};

const bootstrap = async (): Promise<void> => {
  const config = loadConfig();
  const container = createContainer(createSheetsRepositories(config), config);

  await container.engine.initialize();

  const app = createApp(container, config);
  app.listen(config.port, () => {
    logger.info({ port: config.port, authorization: container.engine.state }, 'HTTP server listening');
  });
};

bootstrap().catch((error) => {
  logger.fatal({ error, hint: hintForBootstrapError(error) }, 'Failed to start the API');
  process.exitCode = 1;
});
