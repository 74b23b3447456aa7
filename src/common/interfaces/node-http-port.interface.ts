export interface HttpTextResponse {
  status: number;
  bodyText: string;
}

/**
 * Fetches a status page from one cluster node. Implementations apply the
 * accept-any-certificate TLS policy and reject once `timeoutMs` elapses.
 */
export interface NodeHttpPort {
  getText(url: string, timeoutMs: number): Promise<HttpTextResponse>;
  close(): Promise<void>;
}

export const NODE_HTTP_CLIENT = 'NODE_HTTP_CLIENT';
