import {
  PayloadRow,
  isRecord,
  parseJsonBody,
  requireRecord,
  toCell,
  valueAtPath,
} from './payload-values';

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function tabletDetail(tablet: Record<string, unknown>): string {
  const replicas = records(tablet.replicas)
    .map((replica) => `${toCell(replica.addr)}/${toCell(replica.type)}`)
    .join(',');
  return `leader=${toCell(tablet.leader)} replicas=${replicas}`;
}

/**
 * `/dump-entities`: keyspaces, tables and tablets, one row each. Tablets are
 * the detail level of this kind.
 */
export function parseEntities(body: string): PayloadRow[] {
  const document = requireRecord(parseJsonBody(body), 'entities response');
  const rows: PayloadRow[] = [];

  for (const keyspace of records(document.keyspaces)) {
    rows.push({
      entity_type: 'keyspace',
      id: toCell(keyspace.keyspace_id),
      name: toCell(keyspace.keyspace_name),
      parent_id: '',
      state: '',
      detail: toCell(keyspace.keyspace_type),
    });
  }
  for (const table of records(document.tables)) {
    rows.push({
      entity_type: 'table',
      id: toCell(table.table_id),
      name: toCell(table.table_name),
      parent_id: toCell(table.keyspace_id),
      state: toCell(table.state),
      detail: '',
    });
  }
  for (const tablet of records(document.tablets)) {
    rows.push({
      entity_type: 'tablet',
      id: toCell(tablet.tablet_id),
      name: '',
      parent_id: toCell(tablet.table_id),
      state: toCell(tablet.state),
      detail: tabletDetail(tablet),
    });
  }

  return rows;
}

const TABLET_SERVER_FIELDS = [
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
] as const;

/**
 * `/api/v1/tablet-servers`: `{ <placement uuid>: { <host:port>: {...} } }`.
 */
export function parseTabletServers(body: string): PayloadRow[] {
  const document = requireRecord(parseJsonBody(body), 'tablet servers response');
  const rows: PayloadRow[] = [];

  for (const [placementUuid, servers] of Object.entries(document)) {
    if (!isRecord(servers)) continue;
    for (const [server, details] of Object.entries(servers)) {
      if (!isRecord(details)) continue;
      const row: PayloadRow = { server, placement_uuid: placementUuid };
      for (const field of TABLET_SERVER_FIELDS) {
        row[field] = toCell(details[field]);
      }
      rows.push(row);
    }
  }

  return rows;
}

function connectionRow(direction: string, connection: Record<string, unknown>): PayloadRow {
  const calls = Array.isArray(connection.calls_in_flight) ? connection.calls_in_flight.length : 0;
  const keyspace = toCell(valueAtPath(connection, 'connection_details.cql_connection_details.keyspace'));
  return {
    direction,
    remote: toCell(connection.remote_ip),
    state: toCell(connection.state),
    processed_call_count: toCell(connection.processed_call_count),
    calls_in_flight: String(calls),
    detail: keyspace ? `keyspace=${keyspace}` : toCell(connection.remote_name),
  };
}

/**
 * `/rpcz`. Master, tablet server and YCQL processes report inbound and
 * outbound RPC connections; the YSQL process reports backend connections.
 */
export function parseRpcs(body: string): PayloadRow[] {
  const document = requireRecord(parseJsonBody(body), 'rpcz response');
  const rows: PayloadRow[] = [];

  for (const connection of records(document.inbound_connections)) {
    rows.push(connectionRow('inbound', connection));
  }
  for (const connection of records(document.outbound_connections)) {
    rows.push(connectionRow('outbound', connection));
  }
  for (const connection of records(document.connections)) {
    rows.push({
      direction: 'ysql',
      remote: `${toCell(connection.host)}/${toCell(connection.process_start_time)}`,
      state: toCell(connection.backend_status),
      processed_call_count: '',
      calls_in_flight: '',
      detail: [connection.db_name, connection.application_name, connection.query]
        .map(toCell)
        .filter((part) => part.length > 0)
        .join(' '),
    });
  }

  return rows;
}
