export type HttpScheme = 'http' | 'https';
export type SnapshotStorageType = 'filesystem' | 'memory';

export interface RolePorts {
  master: number;
  tserver: number;
  ysql: number;
  nodeExporter: number;
}

export interface CollectorConfig {
  hosts: string[];
  /** General HTTP port list, used by kinds every server process exposes. */
  ports: number[];
  rolePorts: RolePorts;
  parallel: number;
  scheme: HttpScheme;
  requestTimeoutMs: number;
  probeTimeoutMs: number;
  adhocIntervalMs: number;
}

export interface StorageConfig {
  type: SnapshotStorageType;
  directory: string;
}

export interface AppConfig {
  collector: CollectorConfig;
  storage: StorageConfig;
  logLevel: string;
}

export const DEFAULT_HOSTS = '192.168.66.80,192.168.66.81,192.168.66.82';
export const DEFAULT_PORTS = '7000,9000,12000,13000';

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parsePortList(value: string): number[] {
  return splitList(value)
    .map((item) => parseInt(item, 10))
    .filter((port) => Number.isInteger(port) && port > 0 && port < 65536);
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export default (): AppConfig => ({
  collector: {
    hosts: splitList(process.env.CLUSTERSCOPE_HOSTS || DEFAULT_HOSTS),
    ports: parsePortList(process.env.CLUSTERSCOPE_PORTS || DEFAULT_PORTS),
    rolePorts: {
      master: intFromEnv('CLUSTERSCOPE_MASTER_PORT', 7000),
      tserver: intFromEnv('CLUSTERSCOPE_TSERVER_PORT', 9000),
      ysql: intFromEnv('CLUSTERSCOPE_YSQL_PORT', 13000),
      nodeExporter: intFromEnv('CLUSTERSCOPE_NODE_EXPORTER_PORT', 9300),
    },
    parallel: Math.max(1, intFromEnv('CLUSTERSCOPE_PARALLEL', 1)),
    scheme: process.env.CLUSTERSCOPE_SCHEME === 'https' ? 'https' : 'http',
    requestTimeoutMs: intFromEnv('CLUSTERSCOPE_REQUEST_TIMEOUT_MS', 10000),
    probeTimeoutMs: intFromEnv('CLUSTERSCOPE_PROBE_TIMEOUT_MS', 1000),
    adhocIntervalMs: intFromEnv('CLUSTERSCOPE_ADHOC_INTERVAL_MS', 0),
  },
  storage: {
    type: process.env.SNAPSHOT_STORAGE_TYPE === 'memory' ? 'memory' : 'filesystem',
    directory: process.env.SNAPSHOT_DIRECTORY || 'clusterscope.snapshots',
  },
  logLevel: process.env.CLUSTERSCOPE_LOG_LEVEL || 'warn',
});
