import { EndpointKind, PortRole } from '../common/types/endpoint-kind';
import { METRIC_COLUMNS, METRIC_NAME_COLUMN } from '../common/types/records';
import { parseEntities, parseRpcs, parseTabletServers } from './parsers/cluster.parser';
import { htmlTableRows } from './parsers/html-table.parser';
import { flattenJsonRows, jsonArrayRows, jsonObjectRow } from './parsers/json.parser';
import { PayloadRow } from './parsers/payload-values';
import { parsePrometheusText } from './parsers/prometheus.parser';
import { parseServerMetrics } from './parsers/server-metrics.parser';
import { parseFlagLines, parseGlogLines } from './parsers/text-lines.parser';

export type PayloadParser = (body: string) => PayloadRow[];

interface DescriptorBase {
  kind: EndpointKind;
  /** Request path; `{uuid}` is replaced with the object id of detail kinds. */
  path: string;
  portRole: PortRole;
  /** Kind-specific columns, in file and display order. */
  columns: readonly string[];
  parse: PayloadParser;
  /** Part of a stored or adhoc diff when no kind is named explicitly. */
  diffByDefault: boolean;
  /** Column the stat-name filter applies to. */
  nameColumn?: string;
  /** Columns cut to the configured SQL text length when printed. */
  truncateColumns?: readonly string[];
}

export interface MetricKindDescriptor extends DescriptorBase {
  shape: 'metric';
  /** Columns identifying the measured entity, besides the metric name. */
  entityColumns: readonly string[];
  /** Entity columns folded away (their rows summed) when details are off. */
  collapseColumns: readonly string[];
}

export interface StructuredKindDescriptor extends DescriptorBase {
  shape: 'structured';
  /** Natural key within one host; empty when a host serves a single row. */
  keyColumns: readonly string[];
  /** Columns whose difference makes a row "changed"; defaults to every column. */
  compareColumns?: readonly string[];
  /** Rows only shown when details are on. */
  detailRows?: { column: string; values: readonly string[] };
  /** Column holding a glog severity letter, filtered by the log-severity option. */
  severityColumn?: string;
}

export type EndpointDescriptor = MetricKindDescriptor | StructuredKindDescriptor;

function metricKind(
  spec: Omit<MetricKindDescriptor, 'shape' | 'columns' | 'nameColumn'>,
): MetricKindDescriptor {
  return {
    ...spec,
    shape: 'metric',
    columns: [...spec.entityColumns, ...METRIC_COLUMNS],
    nameColumn: METRIC_NAME_COLUMN,
  };
}

function structuredKind(spec: Omit<StructuredKindDescriptor, 'shape'>): StructuredKindDescriptor {
  return { ...spec, shape: 'structured' };
}

const VERSION_COLUMNS = [
  'git_hash',
  'build_hostname',
  'build_timestamp',
  'build_username',
  'build_clean_repo',
  'build_id',
  'build_type',
  'version_number',
  'build_number',
] as const;

const STATEMENT_COUNTERS = ['calls', 'total_time', 'rows'];
const STATEMENT_GAUGES = ['min_time', 'max_time', 'mean_time', 'stddev_time'];

/** `/statements`: one metric row per statement and statistic. */
function parseStatements(body: string): PayloadRow[] {
  const statements = jsonArrayRows('statements', {
    query_id: 'query_id',
    query: 'query',
    ...Object.fromEntries([...STATEMENT_COUNTERS, ...STATEMENT_GAUGES].map((stat) => [stat, stat])),
  })(body);

  const rows: PayloadRow[] = [];
  for (const statement of statements) {
    const entity = { query_id: statement.query_id, query: statement.query };
    for (const stat of [...STATEMENT_COUNTERS, ...STATEMENT_GAUGES]) {
      if (statement[stat] === '') continue;
      rows.push({
        ...entity,
        metric_name: stat,
        metric_kind: STATEMENT_GAUGES.includes(stat) ? 'gauge' : 'counter',
        value: statement[stat],
      });
    }
  }
  return rows;
}

const DESCRIPTORS: readonly EndpointDescriptor[] = [
  metricKind({
    kind: EndpointKind.METRICS,
    path: '/metrics',
    portRole: 'all',
    entityColumns: ['metric_type', 'metric_id', 'namespace', 'table_name'],
    collapseColumns: ['metric_id', 'namespace', 'table_name'],
    parse: parseServerMetrics,
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.ENTITIES,
    path: '/dump-entities',
    portRole: 'master',
    columns: ['entity_type', 'id', 'name', 'parent_id', 'state', 'detail'],
    keyColumns: ['entity_type', 'id'],
    nameColumn: 'name',
    detailRows: { column: 'entity_type', values: ['tablet'] },
    parse: parseEntities,
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.MASTERS,
    path: '/api/v1/masters',
    portRole: 'master',
    columns: [
      'permanent_uuid',
      'instance_seqno',
      'start_time_us',
      'private_rpc_addresses',
      'http_addresses',
      'cloud',
      'region',
      'zone',
      'placement_uuid',
      'role',
    ],
    keyColumns: ['permanent_uuid'],
    parse: jsonArrayRows('masters', {
      permanent_uuid: 'instance_id.permanent_uuid',
      instance_seqno: 'instance_id.instance_seqno',
      start_time_us: 'instance_id.start_time_us',
      private_rpc_addresses: 'registration.private_rpc_addresses',
      http_addresses: 'registration.http_addresses',
      cloud: 'registration.cloud_info.placement_cloud',
      region: 'registration.cloud_info.placement_region',
      zone: 'registration.cloud_info.placement_zone',
      placement_uuid: 'registration.placement_uuid',
      role: 'role',
    }),
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.TABLET_SERVERS,
    path: '/api/v1/tablet-servers',
    portRole: 'master',
    columns: [
      'server',
      'placement_uuid',
      'status',
      'time_since_hb',
      'uptime_seconds',
      'ram_used',
      'num_sst_files',
      'total_sst_file_size',
      'uncompressed_sst_file_size',
      'read_ops_per_sec',
      'write_ops_per_sec',
      'user_tablets_total',
      'user_tablets_leaders',
      'system_tablets_total',
      'system_tablets_leaders',
      'active_tablets',
      'cloud',
      'region',
      'zone',
    ],
    keyColumns: ['server'],
    compareColumns: [
      'placement_uuid',
      'status',
      'user_tablets_total',
      'user_tablets_leaders',
      'system_tablets_total',
      'system_tablets_leaders',
      'cloud',
      'region',
      'zone',
    ],
    parse: parseTabletServers,
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.VERSIONS,
    path: '/api/v1/version',
    portRole: 'master-tserver',
    columns: VERSION_COLUMNS,
    keyColumns: [],
    parse: jsonObjectRow(Object.fromEntries(VERSION_COLUMNS.map((column) => [column, column]))),
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.VARS,
    path: '/api/v1/varz',
    portRole: 'master-tserver',
    columns: ['name', 'value', 'type'],
    keyColumns: ['name'],
    nameColumn: 'name',
    parse: jsonArrayRows('flags', { name: 'name', value: 'value', type: 'type' }),
    diffByDefault: true,
  }),
  metricKind({
    kind: EndpointKind.NODE_EXPORTER,
    path: '/metrics',
    portRole: 'node-exporter',
    entityColumns: ['labels'],
    collapseColumns: ['labels'],
    parse: parsePrometheusText,
    diffByDefault: true,
  }),
  metricKind({
    kind: EndpointKind.STATEMENTS,
    path: '/statements',
    portRole: 'ysql',
    entityColumns: ['query_id', 'query'],
    collapseColumns: [],
    truncateColumns: ['query'],
    parse: parseStatements,
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.THREADS,
    path: '/threadz?group=all',
    portRole: 'master-tserver',
    columns: ['thread_name', 'user_cpu_s', 'kernel_cpu_s', 'iowait_s', 'stack'],
    keyColumns: ['thread_name'],
    compareColumns: [],
    nameColumn: 'thread_name',
    parse: htmlTableRows({
      firstHeader: 'Thread name',
      columns: ['thread_name', 'user_cpu_s', 'kernel_cpu_s', 'iowait_s', 'stack'],
    }),
    diffByDefault: false,
  }),
  structuredKind({
    kind: EndpointKind.GFLAGS,
    path: '/varz?raw',
    portRole: 'master-tserver',
    columns: ['name', 'value'],
    keyColumns: ['name'],
    nameColumn: 'name',
    parse: parseFlagLines,
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.CLUSTER_CONFIG,
    path: '/api/v1/cluster-config',
    portRole: 'master',
    columns: ['path', 'value'],
    keyColumns: ['path'],
    nameColumn: 'path',
    parse: flattenJsonRows,
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.HEALTH_CHECK,
    path: '/api/v1/health-check',
    portRole: 'master',
    columns: ['path', 'value'],
    keyColumns: ['path'],
    nameColumn: 'path',
    parse: flattenJsonRows,
    diffByDefault: true,
  }),
  structuredKind({
    kind: EndpointKind.DRIVES,
    path: '/drives',
    portRole: 'master-tserver',
    columns: ['path', 'used_space', 'total_space'],
    keyColumns: ['path'],
    compareColumns: ['total_space'],
    parse: htmlTableRows({ firstHeader: 'Path', columns: ['path', 'used_space', 'total_space'] }),
    diffByDefault: false,
  }),
  structuredKind({
    kind: EndpointKind.TABLET_SERVER_OPERATIONS,
    path: '/operations',
    portRole: 'tserver',
    columns: ['tablet_id', 'op_id', 'transaction_type', 'total_time_in_flight', 'description'],
    keyColumns: ['tablet_id', 'op_id'],
    compareColumns: [],
    parse: htmlTableRows({
      firstHeader: 'Tablet id',
      columns: ['tablet_id', 'op_id', 'transaction_type', 'total_time_in_flight', 'description'],
    }),
    diffByDefault: false,
  }),
  structuredKind({
    kind: EndpointKind.MASTER_TASKS,
    path: '/tasks',
    portRole: 'master',
    columns: ['task_name', 'state', 'start_time', 'duration', 'description'],
    keyColumns: ['task_name', 'start_time'],
    compareColumns: ['state'],
    nameColumn: 'task_name',
    parse: htmlTableRows({
      firstHeader: 'Task Name',
      columns: ['task_name', 'state', 'start_time', 'duration', 'description'],
    }),
    diffByDefault: false,
  }),
  structuredKind({
    kind: EndpointKind.TABLE_DETAIL,
    path: '/table?id={uuid}',
    portRole: 'master',
    columns: ['tablet_id', 'partition', 'split_depth', 'state', 'hidden', 'message', 'raft_config'],
    keyColumns: ['tablet_id'],
    parse: htmlTableRows({
      firstHeader: 'Tablet ID',
      columns: ['tablet_id', 'partition', 'split_depth', 'state', 'hidden', 'message', 'raft_config'],
    }),
    diffByDefault: false,
  }),
  structuredKind({
    kind: EndpointKind.TABLET_DETAIL,
    path: '/tablet?id={uuid}',
    portRole: 'tserver',
    columns: ['column_name', 'column_id', 'type'],
    keyColumns: ['column_name'],
    parse: htmlTableRows({ firstHeader: 'Column', columns: ['column_name', 'column_id', 'type'] }),
    diffByDefault: false,
  }),
  structuredKind({
    kind: EndpointKind.LOGS,
    path: '/logs?raw',
    portRole: 'master-tserver',
    columns: ['severity', 'log_time', 'thread_id', 'source', 'message'],
    keyColumns: ['log_time', 'thread_id', 'source', 'message'],
    compareColumns: [],
    severityColumn: 'severity',
    parse: parseGlogLines,
    diffByDefault: false,
  }),
  structuredKind({
    kind: EndpointKind.RPCS,
    path: '/rpcz',
    portRole: 'all',
    columns: ['direction', 'remote', 'state', 'processed_call_count', 'calls_in_flight', 'detail'],
    keyColumns: ['direction', 'remote'],
    compareColumns: ['state'],
    parse: parseRpcs,
    diffByDefault: false,
  }),
  structuredKind({
    kind: EndpointKind.CLOCKS,
    path: '/tablet-server-clocks?raw',
    portRole: 'master',
    columns: [
      'server',
      'time_since_heartbeat',
      'physical_time_utc',
      'hybrid_time_utc',
      'heartbeat_rtt',
      'cloud',
      'region',
      'zone',
    ],
    keyColumns: ['server'],
    compareColumns: ['cloud', 'region', 'zone'],
    parse: htmlTableRows({
      firstHeader: 'Server',
      columns: [
        'server',
        'time_since_heartbeat',
        'physical_time_utc',
        'hybrid_time_utc',
        'heartbeat_rtt',
        'cloud',
        'region',
        'zone',
      ],
    }),
    diffByDefault: false,
  }),
];

const BY_KIND = new Map<EndpointKind, EndpointDescriptor>(
  DESCRIPTORS.map((descriptor) => [descriptor.kind, descriptor]),
);

export function getEndpointDescriptor(kind: EndpointKind): EndpointDescriptor {
  const descriptor = BY_KIND.get(kind);
  if (!descriptor) {
    throw new Error(`No endpoint descriptor registered for kind '${kind}'`);
  }
  return descriptor;
}

export function listEndpointDescriptors(): readonly EndpointDescriptor[] {
  return DESCRIPTORS;
}

export function requiresObjectId(descriptor: EndpointDescriptor): boolean {
  return descriptor.path.includes('{uuid}');
}

/** Row identity within a snapshot: host plus the kind's natural key. */
export function keyColumnsOf(descriptor: EndpointDescriptor): readonly string[] {
  return descriptor.shape === 'metric'
    ? [...descriptor.entityColumns, METRIC_NAME_COLUMN]
    : descriptor.keyColumns;
}
