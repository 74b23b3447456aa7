export enum EndpointKind {
  METRICS = 'metrics',
  ENTITIES = 'entities',
  MASTERS = 'masters',
  TABLET_SERVERS = 'tablet-servers',
  VERSIONS = 'versions',
  VARS = 'vars',
  NODE_EXPORTER = 'node-exporter',
  STATEMENTS = 'statements',
  THREADS = 'threads',
  GFLAGS = 'gflags',
  CLUSTER_CONFIG = 'cluster-config',
  HEALTH_CHECK = 'health-check',
  DRIVES = 'drives',
  TABLET_SERVER_OPERATIONS = 'tablet-server-operations',
  MASTER_TASKS = 'master-tasks',
  TABLE_DETAIL = 'table-detail',
  TABLET_DETAIL = 'tablet-detail',
  LOGS = 'logs',
  RPCS = 'rpcs',
  CLOCKS = 'clocks',
}

export const ENDPOINT_KINDS: readonly EndpointKind[] = Object.values(EndpointKind);

export function isEndpointKind(value: string): value is EndpointKind {
  return ENDPOINT_KINDS.some((kind) => kind === value);
}

/**
 * Metric kinds hold rate-normalized counters and gauges; structured kinds hold
 * key-identified rows such as tables, servers or flags.
 */
export type RecordShape = 'metric' | 'structured';

/** Which configured port(s) an endpoint kind is served on. */
export type PortRole = 'all' | 'master' | 'tserver' | 'master-tserver' | 'ysql' | 'node-exporter';
