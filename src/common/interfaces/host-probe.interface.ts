export interface HostProbe {
  /** TCP connectivity check run before a host is asked for any endpoint. */
  isReachable(host: string, port: number, timeoutMs: number): Promise<boolean>;
}

export const HOST_PROBE = 'HOST_PROBE';
