const STREAM_PATH = '/api/ws';

const DEFAULT_PORTS: Record<string, string> = {
  'ws:': '80',
  'wss:': '443',
};

/**
 * Derive the streaming endpoint from the REST base address.
 *
 * http becomes ws and https becomes wss, default ports are dropped, and the
 * session token rides in the query string as the connection-time credential.
 */
export function buildStreamUrl(restBaseUrl: string, token: string): string {
  const url = new URL(restBaseUrl);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';

  if (url.port === DEFAULT_PORTS[url.protocol]) {
    url.port = '';
  }

  url.pathname = STREAM_PATH;
  url.search = new URLSearchParams({ token }).toString();
  url.hash = '';
  return url.toString();
}
