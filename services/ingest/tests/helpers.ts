import { readFileSync } from 'node:fs';
import path from 'node:path';
import { Headers, Response } from 'undici';
import type { RequestInit } from 'undici';
import type { FetchLike } from '../src/http/httpClient';

export function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(path.join(__dirname, 'fixtures', name), 'utf8'));
}

export type RecordedRequest = {
  url: URL;
  method: string;
  headers: Headers;
};

export type FakeRoute = (request: RecordedRequest) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

/**
 * In-process stand-in for the upstream APIs. Each request goes to the first
 * route whose key prefixes `${method} ${pathname}`; unmatched requests get 404.
 */
export class FakeFetch {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Array<[string, FakeRoute]> = [];

  on(prefix: string, route: FakeRoute): this {
    this.routes.push([prefix, route]);
    return this;
  }

  readonly fetch: FetchLike = async (url: string, init: RequestInit) => {
    const request: RecordedRequest = {
      url: new URL(url),
      method: (init.method ?? 'GET').toUpperCase(),
      headers: new Headers(init.headers)
    };
    this.requests.push(request);
    const key = `${request.method} ${request.url.pathname}`;
    const match = this.routes.find(([prefix]) => key.startsWith(prefix));
    return match ? match[1](request) : new Response('not found', { status: 404 });
  };

  paths(): string[] {
    return this.requests.map((request) => `${request.method} ${request.url.pathname}${request.url.search}`);
  }
}

