import type { Server } from 'node:http';
import type { AppConfig } from '../shared/config';
import { createApp } from './app';
import type { Logger } from './obs/logger';
import { createGeminiGenerator } from './services/genai';
import { RewriteService } from './services/rewriteService';

export const startServer = (config: AppConfig, logger: Logger): Server => {
  logger.info('Config loaded', {
    environment: config.environment,
    archiveRoot: config.archive.rootDir,
    retentionDays: config.archive.retentionDays,
    credentials: {
      keenesentinel: Boolean(config.credentials.keenesentinelCookie),
      reformer: Boolean(config.credentials.reformerCookie),
    },
    llm: { model: config.llm.model, hasApiKey: Boolean(config.llm.apiKey) },
  });

  const rewriteService = new RewriteService(createGeminiGenerator(config, logger), config.llm.maxInputChars);
  const app = createApp({ config, logger, rewriteService });
  const port = config.server.port;

  return app.listen(port, () => {
    logger.info('Server listening', { url: `http://localhost:${port}` });
  });
};
