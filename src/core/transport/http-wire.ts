/**
 * HTTP wire - one request/response exchange against pinned addresses
 *
 * The wire never resolves hostnames itself: the socket connects to the
 * addresses the egress chain admitted, so a second DNS answer can never be
 * used. No connection pooling, since a pooled socket could outlive its pin.
 */

import * as http from 'node:http';
import * as https from 'node:https';
import type { LookupFunction } from 'node:net';
import { RecipeError } from '../../types/errors.js';
import { toRecipeError } from '../../utils/error-envelope.js';
import type { ResolvedAddress } from '../dns-resolver.js';

// ============================================
// TYPES
// ============================================

export interface WireRequest {
  url: URL;
  method: string;
  headers: Record<string, string>;
  body?: string;
  /** Admitted addresses for url.hostname */
  addresses: readonly ResolvedAddress[];
  maxHeaderBytes: number;
  /** Cap on the body as received, before decompression */
  maxRawBytes: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface WireResponse {
  status: number;
  /** Lowercased names; repeated values joined with ", " */
  headers: Record<string, string>;
  setCookies: string[];
  /** Bytes of all header names and values as received */
  headerBytes: number;
  body: Buffer;
}

export interface HttpWire {
  send(request: WireRequest): Promise<WireResponse>;
}

// ============================================
// NODE IMPLEMENTATION
// ============================================

function pinnedLookup(addresses: readonly ResolvedAddress[]): LookupFunction {
  return (_hostname, options, callback) => {
    const family = String(options.family ?? 0);
    const wanted = family === '6' || family === 'IPv6' ? 6 : family === '4' || family === 'IPv4' ? 4 : 0;
    const usable = addresses.filter((entry) => wanted === 0 || wanted === entry.family);
    if (usable.length === 0) {
      const error: NodeJS.ErrnoException = new Error('No pinned address for requested family');
      error.code = 'ENOTFOUND';
      callback(error, '', 0);
      return;
    }
    if (options.all === true) {
      callback(null, usable.map((entry) => ({ address: entry.address, family: entry.family })));
      return;
    }
    callback(null, usable[0].address, usable[0].family);
  };
}

function collectHeaders(message: http.IncomingMessage): Pick<WireResponse, 'headers' | 'setCookies' | 'headerBytes'> {
  const headers: Record<string, string> = {};
  let setCookies: string[] = [];
  for (const [name, value] of Object.entries(message.headers)) {
    if (value === undefined) continue;
    if (name === 'set-cookie') {
      setCookies = Array.isArray(value) ? value : [value];
      continue;
    }
    headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  const headerBytes = message.rawHeaders.reduce((sum, part) => sum + Buffer.byteLength(part), 0);
  return { headers, setCookies, headerBytes };
}

/**
 * Wire backed by node:http and node:https
 */
export class NodeHttpWire implements HttpWire {
  send(request: WireRequest): Promise<WireResponse> {
    const { url } = request;
    const isHttps = url.protocol === 'https:';
    const hostname = url.hostname.startsWith('[') ? url.hostname.slice(1, -1) : url.hostname;

    const options: https.RequestOptions = {
      method: request.method,
      hostname,
      port: url.port === '' ? (isHttps ? 443 : 80) : Number(url.port),
      path: `${url.pathname}${url.search}`,
      headers: { ...request.headers, host: url.host },
      agent: false,
      lookup: pinnedLookup(request.addresses),
      maxHeaderSize: request.maxHeaderBytes,
      signal: request.signal,
    };
    if (isHttps && !hostname.includes(':') && !/^\d+\.\d+\.\d+\.\d+$/.test(hostname)) {
      options.servername = hostname;
    }

    return new Promise<WireResponse>((resolve, reject) => {
      const onResponse = (response: http.IncomingMessage): void => {
        const chunks: Buffer[] = [];
        let received = 0;

        response.on('data', (chunk: Buffer) => {
          received += chunk.length;
          if (received > request.maxRawBytes) {
            response.destroy();
            req.destroy();
            reject(new RecipeError('response-too-large', `Response body exceeds ${request.maxRawBytes} bytes`, {
              stage: 'transport',
              reasons: ['body_bytes'],
            }));
            return;
          }
          chunks.push(chunk);
        });
        response.on('end', () => {
          resolve({
            status: response.statusCode ?? 0,
            ...collectHeaders(response),
            body: Buffer.concat(chunks),
          });
        });
        response.on('error', (error) => reject(toRecipeError(error, 'transport')));
      };

      const req = isHttps ? https.request(options, onResponse) : http.request(options, onResponse);

      req.setTimeout(request.timeoutMs, () => {
        req.destroy(new RecipeError('timed-out', `No response within ${request.timeoutMs}ms`, {
          stage: 'transport',
          reasons: ['socket_timeout'],
        }));
      });
      req.on('error', (error) => reject(toRecipeError(error, 'transport')));

      if (request.body !== undefined) {
        req.end(request.body);
      } else {
        req.end();
      }
    });
  }
}
