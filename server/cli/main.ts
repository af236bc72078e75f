import 'dotenv/config';
import { loadConfig } from '../config/config';
import { CliUsageError, errorMessage } from '../errors';
import { createLogger } from '../obs/logger';
import { rewriteArchive } from '../pipeline/rewriteArchive';
import { runScrape } from '../pipeline/runScrape';
import { todayIso } from '../scraping/dates';
import { createGeminiGenerator } from '../services/genai';
import { RewriteService } from '../services/rewriteService';
import { startServer } from '../index';
import { USAGE, parseCliArgs, type CliCommand } from './args';

const readCommand = (): CliCommand | null => {
  try {
    return parseCliArgs(process.argv.slice(2), todayIso());
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return null;
    }
    throw error;
  }
};

const main = async (): Promise<number> => {
  const command = readCommand();
  if (!command) {
    return 1;
  }

  if (command.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig();
  const logger = createLogger(config);

  switch (command.command) {
    case 'scrape': {
      const report = await runScrape({ sites: command.sites, targetDate: command.targetDate, config, logger });
      const saved = report.sites.reduce((sum, site) => sum + site.files.length, 0);
      logger.info('Scrape summary', {
        targetDate: report.targetDate,
        saved,
        failedSites: report.sites.filter((site) => site.status === 'failed').map((site) => site.site),
        swept: report.swept.length,
      });
      return 0;
    }
    case 'rewrite': {
      if (!config.llm.apiKey) {
        logger.error('GEMINI_API_KEY missing; cannot rewrite');
        return 1;
      }
      const service = new RewriteService(createGeminiGenerator(config, logger), config.llm.maxInputChars);
      const report = await rewriteArchive({
        rootDir: config.archive.rootDir,
        service,
        logger,
        sites: command.sites,
        date: command.date,
        force: command.force,
        limit: command.limit,
      });
      logger.info('Rewrite summary', { ...report, files: report.files.length });
      return report.errors > 0 ? 1 : 0;
    }
    case 'serve':
      startServer(config, logger);
      return 0;
  }
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
