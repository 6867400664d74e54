import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { QueryParams, Transport, TransportResponse } from "../../src/core/transport";

export interface RecordedRequest {
  path: string;
  accept: string;
  query?: QueryParams;
}

type Route = TransportResponse | Error | ((request: RecordedRequest) => TransportResponse);

/** In-process stand-in for the API: routes by path, 404 for anything unknown. */
export class FakeTransport implements Transport {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Route>();

  on(routePath: string, route: Route): this {
    this.routes.set(routePath, route);
    return this;
  }

  async get(requestPath: string, accept: string, query?: QueryParams): Promise<TransportResponse> {
    const request = { path: requestPath, accept, query };
    this.requests.push(request);
    const route = this.routes.get(requestPath);
    if (route === undefined) {
      return { status: 404, body: Buffer.from("") };
    }
    if (route instanceof Error) {
      throw route;
    }
    return typeof route === "function" ? route(request) : route;
  }

  requestsFor(requestPath: string): RecordedRequest[] {
    return this.requests.filter((request) => request.path === requestPath);
  }
}

export function ok(body: string | Buffer): TransportResponse {
  return { status: 200, body: Buffer.isBuffer(body) ? body : Buffer.from(body) };
}

export function status(code: number): TransportResponse {
  return { status: code, body: Buffer.from("") };
}

export function listPage(uris: string[], changeStatus = "NEW"): TransportResponse {
  return ok(JSON.stringify(uris.map((uri) => ({ akn_uri: uri, status: changeStatus }))));
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}
