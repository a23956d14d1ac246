import { Agent, fetch } from 'undici';
import type { ApnsFetch } from './apns-provider.js';

/**
 * A fetch that negotiates HTTP/2 over ALPN. Node's global fetch stays on
 * HTTP/1.1, which APNs refuses.
 */
export function createHttp2Fetch(): ApnsFetch {
  const dispatcher = new Agent({ allowH2: true });
  return (url, init) => fetch(url, { ...init, dispatcher });
}
