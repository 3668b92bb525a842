/** Legacy endpoint: every action is a GET against this URL with `a=<action>` */
export const DEFAULT_ENDPOINT = 'https://www.cloudflare.com/api_json.html';

/** Per-request timeout in milliseconds */
export const REQUEST_TIMEOUT_MS = 10_000;

/** Hard cap on pages fetched for one listing */
export const MAX_PAGES = 100;

/** Record types the API accepts */
export const RECORD_TYPES = [
  'A',
  'CNAME',
  'MX',
  'TXT',
  'SPF',
  'AAAA',
  'NS',
  'SRV',
  'LOC',
] as const;

/** TTL value the API reads as "automatic" */
export const AUTO_TTL = 1;

export const ACTION_LIST = 'rec_load_all';
export const ACTION_CREATE = 'rec_new';
export const ACTION_DELETE = 'rec_delete';
