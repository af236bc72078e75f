import { createBloxAdapter } from './blox';

export const reformerAdapter = createBloxAdapter({
  slug: 'reformer',
  name: 'Brattleboro Reformer',
  baseUrl: 'https://www.reformer.com',
  refererPath: '/local-news/',
  category: 'local-news',
  limit: 50,
  timestampKeys: ['iso8601', 'value'],
  stopWords: ['copyright', 'subscribe', 'sign up', 'print', 'email', 'click here'],
  cookie: (config) => config.credentials.reformerCookie,
  requireCookie: true,
});
