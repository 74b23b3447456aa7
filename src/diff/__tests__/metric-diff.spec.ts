import { EndpointKind } from '../../common/types/endpoint-kind';
import { T0, T60, metricDescriptor, metricRecord, record, syntheticFields } from '../../../test/test-utils';
import { diffMetricRecords } from '../metric-diff';
import { DiffInput } from '../record-sets';

const A = '10.0.0.1:9000';
const B = '10.0.0.2:9000';
const descriptor = metricDescriptor(EndpointKind.METRICS);

function input(begin: DiffInput['begin'], end: DiffInput['end'], beginTime = T0): DiffInput {
  return {
    begin,
    end,
    beginSource: { label: 'begin', timestamp: beginTime },
    endSource: { label: 'end', timestamp: T60 },
  };
}

describe('diffMetricRecords', () => {
  it('should divide the delta by the elapsed seconds', () => {
    const diff = diffMetricRecords(
      descriptor,
      input([metricRecord(A, T0, 'rows_inserted', 0)], [metricRecord(A, T60, 'rows_inserted', 120)]),
    );

    expect(diff.rows).toEqual([
      {
        hostname_port: A,
        entity: { metric_type: 'server', metric_id: 'yb.tabletserver', namespace: '', table_name: '' },
        name: 'rows_inserted',
        gauge: false,
        beginValue: 0,
        endValue: 120,
        delta: 120,
        counterReset: false,
        elapsedSeconds: 60,
        rate: 2,
      },
    ]);
  });

  it('should report the end value as delta after a counter reset', () => {
    const diff = diffMetricRecords(
      descriptor,
      input([metricRecord(A, T0, 'rows_inserted', 100)], [metricRecord(A, T60, 'rows_inserted', 10)]),
    );

    expect(diff.rows[0]).toMatchObject({ delta: 10, counterReset: true, beginValue: 100, endValue: 10 });
  });

  it('should pass negative gauge deltas through', () => {
    const diff = diffMetricRecords(
      descriptor,
      input([metricRecord(A, T0, 'follower_lag_ms', 50, 'gauge')], [metricRecord(A, T60, 'follower_lag_ms', 20, 'gauge')]),
    );

    expect(diff.rows[0]).toMatchObject({ delta: -30, counterReset: false, rate: -0.5 });
  });

  it('should start new metrics at zero, timed from the host begin pass', () => {
    const diff = diffMetricRecords(
      descriptor,
      input([metricRecord(A, T0, 'rows_inserted', 5)], [metricRecord(A, T60, 'rows_inserted', 5), metricRecord(A, T60, 'rows_updated', 30)]),
    );

    expect(diff.rows.map((row) => [row.name, row.beginValue, row.delta, row.elapsedSeconds, row.rate])).toEqual([
      ['rows_inserted', 5, 0, 60, 0],
      ['rows_updated', 0, 30, 60, 0.5],
    ]);
  });

  it('should time metrics of a host new in the end set from the begin capture', () => {
    const diff = diffMetricRecords(
      descriptor,
      input([], [metricRecord(B, T60, 'rows_inserted', 90)], '2024-05-01T09:59:30.000Z'),
    );

    expect(diff.rows[0]).toMatchObject({ hostname_port: B, delta: 90, elapsedSeconds: 90, rate: 1 });
  });

  it('should not report metrics that disappeared', () => {
    const diff = diffMetricRecords(descriptor, input([metricRecord(A, T0, 'rows_inserted', 5)], []));

    expect(diff.rows).toEqual([]);
  });

  it('should give zero deltas and no rate when diffing a capture with itself', () => {
    const records = [metricRecord(A, T0, 'rows_inserted', 5), metricRecord(A, T0, 'follower_lag_ms', 3, 'gauge')];

    const diff = diffMetricRecords(descriptor, input(records, records));

    expect(diff.rows.map((row) => [row.delta, row.rate])).toEqual([
      [0, null],
      [0, null],
    ]);
  });

  it('should negate deltas when begin and end are swapped', () => {
    const first = [metricRecord(A, T0, 'follower_lag_ms', 10, 'gauge'), metricRecord(B, T0, 'raft_term', 4, 'gauge')];
    const second = [metricRecord(A, T60, 'follower_lag_ms', 25, 'gauge'), metricRecord(B, T60, 'raft_term', 3, 'gauge')];

    const forward = diffMetricRecords(descriptor, input(first, second));
    const backward = diffMetricRecords(descriptor, input(second, first));

    expect(forward.rows.map((row) => row.delta)).toEqual([15, -1]);
    expect(backward.rows.map((row) => row.delta)).toEqual([-15, 1]);
  });

  it('should leave out hosts without data on either side', () => {
    const diff = diffMetricRecords(
      descriptor,
      input(
        [metricRecord(A, T0, 'rows_inserted', 1), metricRecord(B, T0, 'rows_inserted', 1)],
        [metricRecord(A, T60, 'rows_inserted', 2), record(B, T60, syntheticFields(EndpointKind.METRICS), true)],
      ),
    );

    expect(diff.unavailableHosts).toEqual([B]);
    expect(diff.rows.map((row) => row.hostname_port)).toEqual([A]);
  });

  it('should tell entities apart by their entity columns', () => {
    const orders = { metric_type: 'table', metric_id: 'tb1', namespace: 'yugabyte', table_name: 'orders' };
    const items = { metric_type: 'table', metric_id: 'tb2', namespace: 'yugabyte', table_name: 'items' };

    const diff = diffMetricRecords(
      descriptor,
      input(
        [metricRecord(A, T0, 'rows_inserted', 1, 'counter', orders), metricRecord(A, T0, 'rows_inserted', 1, 'counter', items)],
        [metricRecord(A, T60, 'rows_inserted', 4, 'counter', orders), metricRecord(A, T60, 'rows_inserted', 7, 'counter', items)],
      ),
    );

    expect(diff.rows.map((row) => [row.entity.table_name, row.delta])).toEqual([
      ['orders', 3],
      ['items', 6],
    ]);
  });
});
