import { Agent, Dispatcher, request } from 'undici';
import { HttpTextResponse, NodeHttpPort } from '../common/interfaces/node-http-port.interface';

export class RequestTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

/** Cluster nodes commonly serve self-signed certificates; they are accepted as-is. */
export function createInsecureAgent(): Agent {
  return new Agent({ connect: { rejectUnauthorized: false } });
}

export class UndiciHttpClient implements NodeHttpPort {
  constructor(private readonly dispatcher: Dispatcher) {}

  async getText(url: string, timeoutMs: number): Promise<HttpTextResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await request(url, {
        method: 'GET',
        dispatcher: this.dispatcher,
        signal: controller.signal,
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
      });
      const bodyText = await response.body.text();
      return { status: response.statusCode, bodyText };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new RequestTimeoutError(url, timeoutMs);
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}
