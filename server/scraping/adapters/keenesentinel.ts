import { createBloxAdapter } from './blox';

export const keeneSentinelAdapter = createBloxAdapter({
  slug: 'keenesentinel',
  name: 'Keene Sentinel',
  baseUrl: 'https://www.keenesentinel.com',
  refererPath: '/news/local/',
  category: 'news/local',
  limit: 100,
  timestampKeys: ['iso8601', 'value', 'iso'],
  stopWords: ['copyright', 'subscribe', 'sign up', 'print', 'email'],
  cookie: (config) => config.credentials.keenesentinelCookie,
  requireCookie: false,
});
