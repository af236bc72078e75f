import { SITE_SLUGS, isSiteSlug, type SiteSlug } from '../../shared/config';
import { keeneSentinelAdapter } from './adapters/keenesentinel';
import { myKeeneNowAdapter } from './adapters/mykeenenow';
import { reformerAdapter } from './adapters/reformer';
import { vtdiggerAdapter } from './adapters/vtdigger';
import { wcaxAdapter } from './adapters/wcax';
import { wmurAdapter } from './adapters/wmur';
import type { SiteAdapter } from './types';

export const ADAPTERS: Readonly<Record<SiteSlug, SiteAdapter>> = {
  wmur: wmurAdapter,
  wcax: wcaxAdapter,
  vtdigger: vtdiggerAdapter,
  mykeenenow: myKeeneNowAdapter,
  keenesentinel: keeneSentinelAdapter,
  reformer: reformerAdapter,
};

export const SITE_SELECTOR_ALL = 'all';

/** `all` or a single slug; returns null for anything else. */
export const resolveSiteSelector = (selector: string): SiteSlug[] | null => {
  const normalized = selector.trim().toLowerCase();
  if (normalized === SITE_SELECTOR_ALL) return [...SITE_SLUGS];
  return isSiteSlug(normalized) ? [normalized] : null;
};

export const getAdapter = (slug: SiteSlug): SiteAdapter => ADAPTERS[slug];
