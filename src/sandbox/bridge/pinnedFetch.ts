import * as http from 'node:http';
import * as https from 'node:https';
import { isIP } from 'node:net';
import type { LookupFunction } from 'node:net';

export interface GuestFetchInit {
  method: string;
  headers: Record<string, string>;
  body?: string;
  redirect: 'manual';
  signal: AbortSignal;
  /** Address already checked by the fetch policy; the connection must use it. */
  address?: string;
}

/**
 * Transport behind guest `fetch`. Shaped so the global `fetch` can stand in
 * where no address pinning is needed.
 */
export type GuestFetch = (url: URL, init: GuestFetchInit) => Promise<Response>;

// statuses a Response refuses to carry a body for
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

function pinnedLookup(address: string): LookupFunction {
  const family = isIP(address);
  return (_hostname, options, callback) => {
    if (options.all) {
      callback(null, [{ address, family }]);
    } else {
      callback(null, address, family);
    }
  };
}

function toHeaders(incoming: http.IncomingHttpHeaders): Headers {
  const headers = new Headers();
  for (const [key, value] of Object.entries(incoming)) {
    if (Array.isArray(value)) {
      value.forEach((item) => headers.append(key, item));
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }
  return headers;
}

function toBodyStream(res: http.IncomingMessage): ReadableStream<Uint8Array> {
  let open = true;
  return new ReadableStream<Uint8Array>({
    start(controller) {
      const fail = (error: Error): void => {
        if (open) {
          open = false;
          controller.error(error);
        }
      };
      res.on('data', (chunk: Buffer) => {
        if (!open) {
          return;
        }
        controller.enqueue(new Uint8Array(chunk));
        if ((controller.desiredSize ?? 0) <= 0) {
          res.pause();
        }
      });
      res.on('end', () => {
        if (open) {
          open = false;
          controller.close();
        }
      });
      res.on('error', fail);
      res.on('close', () => {
        if (!res.complete) {
          fail(new Error('response aborted'));
        }
      });
    },
    pull() {
      res.resume();
    },
    cancel() {
      open = false;
      res.destroy();
    },
  });
}

/**
 * Send the request over a connection to `init.address` while keeping the
 * original hostname for the Host header and TLS verification, so a second
 * DNS answer can never redirect it. Redirects are never followed.
 */
export const fetchPinned: GuestFetch = (url, init) =>
  new Promise<Response>((resolve, reject) => {
    const options: http.RequestOptions = {
      method: init.method,
      headers: init.headers,
      signal: init.signal,
      ...(init.address ? { lookup: pinnedLookup(init.address) } : {}),
    };
    const onResponse = (res: http.IncomingMessage): void => {
      const status = res.statusCode ?? 0;
      const bodyless = NULL_BODY_STATUSES.has(status);
      if (bodyless) {
        res.resume();
      }
      try {
        resolve(
          new Response(bodyless ? null : toBodyStream(res), {
            status,
            statusText: res.statusMessage,
            headers: toHeaders(res.headers),
          }),
        );
      } catch (error) {
        res.destroy();
        reject(error);
      }
    };

    const req =
      url.protocol === 'https:' ? https.request(url, options, onResponse) : http.request(url, options, onResponse);
    req.on('error', reject);
    req.end(init.body);
  });
