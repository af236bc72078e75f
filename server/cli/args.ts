import { SITE_SLUGS, parsePositiveInt, type SiteSlug } from '../../shared/config';
import type { CalendarDate } from '../../shared/types';
import { CliUsageError } from '../errors';
import { isCalendarDate } from '../scraping/dates';
import { SITE_SELECTOR_ALL, resolveSiteSelector } from '../scraping/registry';

export type CliCommand =
  | { command: 'scrape'; sites: SiteSlug[]; targetDate: CalendarDate }
  | { command: 'rewrite'; sites: SiteSlug[]; date?: CalendarDate; force: boolean; limit?: number }
  | { command: 'serve' }
  | { command: 'help' };

export const USAGE = `Usage:
  scrape  [--site <slug|all>] [--date YYYY-MM-DD]
  rewrite [--site <slug|all>] [--date YYYY-MM-DD] [--force] [--limit N]
  serve

Sites: wmur, wcax, vtdigger, mykeenenow, keenesentinel, reformer (default: all)
Scrape date defaults to today.`;

interface RawArgs {
  command: string;
  site: string;
  date?: string;
  force: boolean;
  limit?: string;
  help: boolean;
}

const takeValue = (args: readonly string[], index: number, flag: string): string => {
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
};

const readRawArgs = (args: readonly string[]): RawArgs => {
  const result: RawArgs = { command: 'scrape', site: SITE_SELECTOR_ALL, force: false, help: false };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--site':
      case '-s':
        result.site = takeValue(args, i, arg);
        i++;
        break;
      case '--date':
      case '-d':
        result.date = takeValue(args, i, arg);
        i++;
        break;
      case '--limit':
        result.limit = takeValue(args, i, arg);
        i++;
        break;
      case '--force':
        result.force = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-') || commandSeen) {
          throw new CliUsageError(`Unknown argument: ${arg}`);
        }
        result.command = arg;
        commandSeen = true;
    }
  }
  return result;
};

/**
 * Validates everything up front so that a bad site or date fails before any request is made.
 * `today` is the default scrape date.
 */
export const parseCliArgs = (args: readonly string[], today: CalendarDate): CliCommand => {
  const raw = readRawArgs(args);
  if (raw.help) {
    return { command: 'help' };
  }

  const sites = resolveSiteSelector(raw.site);
  if (!sites) {
    throw new CliUsageError(`Unknown site "${raw.site}". Expected one of: ${SITE_SELECTOR_ALL}, ${SITE_SLUGS.join(', ')}`);
  }
  if (raw.date !== undefined && !isCalendarDate(raw.date)) {
    throw new CliUsageError(`Invalid date "${raw.date}". Use YYYY-MM-DD.`);
  }

  switch (raw.command) {
    case 'scrape':
      return { command: 'scrape', sites, targetDate: raw.date ?? today };
    case 'rewrite': {
      const limit = raw.limit === undefined ? undefined : parsePositiveInt(raw.limit);
      if (raw.limit !== undefined && limit === undefined) {
        throw new CliUsageError(`Invalid limit "${raw.limit}". Expected a positive integer.`);
      }
      return { command: 'rewrite', sites, date: raw.date, force: raw.force, limit };
    }
    case 'serve':
      return { command: 'serve' };
    default:
      throw new CliUsageError(`Unknown command "${raw.command}"`);
  }
};
