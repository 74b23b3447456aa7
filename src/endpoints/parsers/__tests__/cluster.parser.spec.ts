import { parseEntities, parseRpcs, parseTabletServers } from '../cluster.parser';

describe('parseEntities', () => {
  it('should emit keyspaces, tables and tablets', () => {
    const body = JSON.stringify({
      keyspaces: [{ keyspace_id: 'ks1', keyspace_name: 'yugabyte', keyspace_type: 'ysql' }],
      tables: [{ table_id: 'tb1', table_name: 'orders', keyspace_id: 'ks1', state: 'RUNNING' }],
      tablets: [
        {
          table_id: 'tb1',
          tablet_id: 'tl1',
          state: 'RUNNING',
          leader: 'ts-a',
          replicas: [
            { type: 'VOTER', server_uuid: 'ts-a', addr: '10.0.0.1:9100' },
            { type: 'VOTER', server_uuid: 'ts-b', addr: '10.0.0.2:9100' },
          ],
        },
      ],
    });

    expect(parseEntities(body)).toEqual([
      { entity_type: 'keyspace', id: 'ks1', name: 'yugabyte', parent_id: '', state: '', detail: 'ysql' },
      { entity_type: 'table', id: 'tb1', name: 'orders', parent_id: 'ks1', state: 'RUNNING', detail: '' },
      {
        entity_type: 'tablet',
        id: 'tl1',
        name: '',
        parent_id: 'tb1',
        state: 'RUNNING',
        detail: 'leader=ts-a replicas=10.0.0.1:9100/VOTER,10.0.0.2:9100/VOTER',
      },
    ]);
  });
});

describe('parseTabletServers', () => {
  it('should emit one row per server of every placement', () => {
    const body = JSON.stringify({
      'pl-1': {
        '10.0.0.1:9000': {
          status: 'ALIVE',
          time_since_hb: '0.5s',
          uptime_seconds: 100,
          user_tablets_total: 3,
          cloud: 'cloud1',
          region: 'region1',
          zone: 'zone1',
        },
      },
    });

    const [row, ...rest] = parseTabletServers(body);

    expect(rest).toEqual([]);
    expect(row).toMatchObject({
      server: '10.0.0.1:9000',
      placement_uuid: 'pl-1',
      status: 'ALIVE',
      time_since_hb: '0.5s',
      uptime_seconds: '100',
      user_tablets_total: '3',
      ram_used: '',
      cloud: 'cloud1',
      region: 'region1',
      zone: 'zone1',
    });
    expect(Object.keys(row)).toHaveLength(19);
  });
});

describe('parseRpcs', () => {
  it('should read inbound and outbound connections', () => {
    const body = JSON.stringify({
      inbound_connections: [
        { remote_ip: '10.0.0.2:40000', state: 'OPEN', processed_call_count: 12, calls_in_flight: [{}, {}] },
      ],
      outbound_connections: [{ remote_ip: '10.0.0.3:7100', state: 'OPEN', processed_call_count: 5 }],
    });

    expect(parseRpcs(body)).toEqual([
      {
        direction: 'inbound',
        remote: '10.0.0.2:40000',
        state: 'OPEN',
        processed_call_count: '12',
        calls_in_flight: '2',
        detail: '',
      },
      {
        direction: 'outbound',
        remote: '10.0.0.3:7100',
        state: 'OPEN',
        processed_call_count: '5',
        calls_in_flight: '0',
        detail: '',
      },
    ]);
  });

  it('should read YSQL backend connections', () => {
    const body = JSON.stringify({
      connections: [
        {
          db_name: 'yugabyte',
          host: '127.0.0.1',
          process_start_time: '2024-05-01 10:00:00',
          application_name: 'psql',
          backend_status: 'active',
          query: 'select 1',
        },
      ],
    });

    expect(parseRpcs(body)).toEqual([
      {
        direction: 'ysql',
        remote: '127.0.0.1/2024-05-01 10:00:00',
        state: 'active',
        processed_call_count: '',
        calls_in_flight: '',
        detail: 'yugabyte psql select 1',
      },
    ]);
  });
});
