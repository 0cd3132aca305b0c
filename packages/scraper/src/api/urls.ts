import type { PageRequest } from './types';

export const DEFAULT_BASE_URL = 'https://twitter.com';

const SEARCH_INIT_PATH = '/search?f=tweets&vertical=default&q={query}&l={lang}';

const SEARCH_RELOAD_PATH = '/i/search/timeline?f=tweets&vertical=default'
  + '&include_available_features=1&include_entities=1&reset_error_state=false&src=typd'
  + '&max_position={cursor}&q={query}&l={lang}';

const USER_INIT_PATH = '/{query}';

const USER_RELOAD_PATH = '/i/profiles/show/{query}/timeline/tweets'
  + '?include_available_features=1&include_entities=1'
  + '&max_position={cursor}&reset_error_state=false';

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (_, key: string) => encodeURIComponent(values[key] ?? ''));
}

export function buildUrl(request: PageRequest, baseUrl: string = DEFAULT_BASE_URL): string {
  const root = baseUrl.replace(/\/+$/, '');
  const hasCursor = request.cursor !== null && request.cursor !== '';
  const template = request.fromUser
    ? (hasCursor ? USER_RELOAD_PATH : USER_INIT_PATH)
    : (hasCursor ? SEARCH_RELOAD_PATH : SEARCH_INIT_PATH);

  return root + fill(template, {
    query: request.query,
    lang: request.lang,
    cursor: request.cursor ?? '',
  });
}

export function buildProfileUrl(user: string, baseUrl: string = DEFAULT_BASE_URL): string {
  return buildUrl({ query: user, lang: '', cursor: null, fromUser: true }, baseUrl);
}
