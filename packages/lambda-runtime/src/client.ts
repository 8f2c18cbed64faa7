/**
 * Wharf Lambda Runtime — Runtime API Client
 *
 * Talks to the Lambda runtime API at `http://<AWS_LAMBDA_RUNTIME_API>`:
 *
 *   GET  /2018-06-01/runtime/invocation/next
 *   POST /2018-06-01/runtime/invocation/<request id>/response
 *   POST /2018-06-01/runtime/invocation/<request id>/error
 *
 * A non-2xx answer to `next` means there is no event. Transport failures
 * reject; the poller logs them and polls again.
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import type { RuntimeLog } from './log.js';

export const RUNTIME_VERSION = '0.1.0';
export const USER_AGENT = `wharf-lambda-runtime/${RUNTIME_VERSION}`;
export const API_VERSION = '2018-06-01';

export interface InvocationEvent {
  readonly body: Buffer;
  readonly requestId?: string | undefined;
  readonly traceId?: string | undefined;
}

/** What the poller needs from the runtime API. */
export interface InvocationClient {
  nextInvocationEvent(): Promise<InvocationEvent | undefined>;
  sendInvocationResponse(requestId: string, body: Buffer): Promise<void>;
  sendInvocationError(requestId: string, message: string): Promise<void>;
}

export interface RuntimeClientOptions {
  readonly log: RuntimeLog;
  /** Replaces the HTTP transport; tests answer requests in process. */
  readonly adapter?: AxiosAdapter | undefined;
}

function header(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export class RuntimeClient implements InvocationClient {
  private readonly http: AxiosInstance;
  private readonly log: RuntimeLog;

  constructor(
    readonly endpoint: string,
    options: RuntimeClientOptions,
  ) {
    this.log = options.log;
    this.http = axios.create({
      baseURL: `http://${endpoint}/${API_VERSION}/runtime`,
      headers: { 'User-Agent': USER_AGENT },
      validateStatus: () => true,
      ...(options.adapter !== undefined ? { adapter: options.adapter } : {}),
    });
  }

  private logged(method: string, path: string, response: AxiosResponse): void {
    this.log.info(`${method} ${this.http.defaults.baseURL ?? ''}${path} ${response.status} ${response.statusText}`);
  }

  async nextInvocationEvent(): Promise<InvocationEvent | undefined> {
    const path = '/invocation/next';
    const response = await this.http.get<ArrayBuffer>(path, { responseType: 'arraybuffer' });
    this.logged('GET', path, response);
    if (response.status < 200 || response.status > 299) {
      return undefined;
    }
    return {
      body: Buffer.from(response.data),
      requestId: header(response, 'lambda-runtime-aws-request-id'),
      traceId: header(response, 'lambda-runtime-trace-id'),
    };
  }

  async sendInvocationResponse(requestId: string, body: Buffer): Promise<void> {
    const path = `/invocation/${encodeURIComponent(requestId)}/response`;
    const response = await this.http.post(path, body, {
      headers: { 'Content-Type': 'application/octet-stream' },
    });
    this.logged('POST', path, response);
  }

  async sendInvocationError(requestId: string, message: string): Promise<void> {
    const path = `/invocation/${encodeURIComponent(requestId)}/error`;
    const response = await this.http.post(path, { errorMessage: message });
    this.logged('POST', path, response);
  }
}
