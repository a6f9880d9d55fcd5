import { request as nodeHttpRequest, type IncomingHttpHeaders, type RequestOptions } from 'http';
import { URL } from 'url';
import { TimeoutError } from '../errors/household-errors.js';

export interface HttpRequestOptions {
  url: string;
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  timeout?: number;
}

export interface HttpResponse {
  statusCode: number;
  statusMessage: string;
  headers: IncomingHttpHeaders;
  body: string;
}

/**
 * Plain HTTP request that also carries the GENA verbs (SUBSCRIBE, UNSUBSCRIBE)
 * fetch() refuses to send
 */
export async function httpRequest(options: HttpRequestOptions): Promise<HttpResponse> {
  const url = new URL(options.url);
  const timeout = options.timeout ?? 10000;

  const requestOptions: RequestOptions = {
    hostname: url.hostname,
    port: url.port ? parseInt(url.port, 10) : 80,
    path: url.pathname + url.search,
    method: options.method || 'GET',
    headers: options.headers || {},
    timeout
  };

  return new Promise((resolve, reject) => {
    const req = nodeHttpRequest(requestOptions, (res) => {
      let body = '';

      res.setEncoding('utf8');
      res.on('data', (chunk: string) => {
        body += chunk;
      });

      res.on('end', () => {
        resolve({
          statusCode: res.statusCode || 0,
          statusMessage: res.statusMessage || '',
          headers: res.headers,
          body
        });
      });

      res.on('error', reject);
    });

    req.on('error', reject);

    req.on('timeout', () => {
      req.destroy();
      reject(new TimeoutError(`${requestOptions.method} ${options.url}`, timeout));
    });

    if (options.body) {
      req.write(options.body);
    }

    req.end();
  });
}

export function headerValue(headers: IncomingHttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}
