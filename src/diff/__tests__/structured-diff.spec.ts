import { EndpointKind } from '../../common/types/endpoint-kind';
import { T0, T60, record, structuredDescriptor, syntheticFields } from '../../../test/test-utils';
import { DiffInput } from '../record-sets';
import { diffStructuredRecords } from '../structured-diff';

const A = '10.0.0.1:7000';
const B = '10.0.0.2:7000';

function input(begin: DiffInput['begin'], end: DiffInput['end']): DiffInput {
  return {
    begin,
    end,
    beginSource: { label: 'begin', timestamp: T0 },
    endSource: { label: 'end', timestamp: T60 },
  };
}

const flag = (host: string, timestamp: string, name: string, value: string) => record(host, timestamp, { name, value });

describe('diffStructuredRecords', () => {
  const gflags = structuredDescriptor(EndpointKind.GFLAGS);
  const begin = [flag(A, T0, 'a', '1'), flag(A, T0, 'b', '2')];
  const end = [flag(A, T60, 'a', '5'), flag(A, T60, 'c', '3')];

  it('should label added, removed and changed rows', () => {
    expect(diffStructuredRecords(gflags, input(begin, end)).rows).toEqual([
      {
        hostname_port: A,
        key: { name: 'a' },
        change: 'changed',
        begin: { name: 'a', value: '1' },
        end: { name: 'a', value: '5' },
        changedFields: ['value'],
      },
      { hostname_port: A, key: { name: 'b' }, change: 'removed', begin: { name: 'b', value: '2' }, end: null, changedFields: [] },
      { hostname_port: A, key: { name: 'c' }, change: 'added', begin: null, end: { name: 'c', value: '3' }, changedFields: [] },
    ]);
  });

  it('should find nothing when diffing a capture with itself', () => {
    expect(diffStructuredRecords(gflags, input(begin, begin)).rows).toEqual([]);
  });

  it('should swap added and removed when begin and end are swapped', () => {
    const rows = diffStructuredRecords(gflags, input(end, begin)).rows;

    expect(rows.map((row) => [row.key.name, row.change])).toEqual([
      ['a', 'changed'],
      ['b', 'added'],
      ['c', 'removed'],
    ]);
  });

  it('should only compare the columns the kind compares', () => {
    const servers = structuredDescriptor(EndpointKind.TABLET_SERVERS);
    const server = (timestamp: string, status: string, uptime: string) =>
      record(A, timestamp, { server: '10.0.0.3:9000', status, uptime_seconds: uptime });

    expect(diffStructuredRecords(servers, input([server(T0, 'ALIVE', '10')], [server(T60, 'ALIVE', '70')])).rows).toEqual([]);
    expect(
      diffStructuredRecords(servers, input([server(T0, 'ALIVE', '10')], [server(T60, 'DEAD', '70')])).rows[0].changedFields,
    ).toEqual(['status']);
  });

  it('should report hosts without data instead of removing their rows', () => {
    const diff = diffStructuredRecords(
      gflags,
      input([...begin, flag(B, T0, 'a', '1')], [...begin, record(B, T60, syntheticFields(EndpointKind.GFLAGS), true)]),
    );

    expect(diff.unavailableHosts).toEqual([B]);
    expect(diff.rows).toEqual([]);
  });

  it('should compare single-row kinds host by host', () => {
    const versions = structuredDescriptor(EndpointKind.VERSIONS);

    const diff = diffStructuredRecords(
      versions,
      input([record(A, T0, { version_number: '2.11.2.0' })], [record(A, T60, { version_number: '2.12.0.0' })]),
    );

    expect(diff.rows).toEqual([
      {
        hostname_port: A,
        key: {},
        change: 'changed',
        begin: { version_number: '2.11.2.0' },
        end: { version_number: '2.12.0.0' },
        changedFields: ['version_number'],
      },
    ]);
  });
});
