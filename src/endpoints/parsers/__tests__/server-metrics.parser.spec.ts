import { PayloadShapeError } from '../payload-values';
import { isGaugeMetric, parseServerMetrics } from '../server-metrics.parser';

describe('parseServerMetrics', () => {
  it('should emit one row per value and split aggregate metrics into counters', () => {
    const body = JSON.stringify([
      {
        type: 'tablet',
        id: 't-1',
        attributes: { namespace_name: 'yugabyte', table_name: 'orders' },
        metrics: [
          { name: 'rows_inserted', value: 42 },
          { name: 'follower_lag_ms', value: 7 },
          { name: 'handler_latency_read', total_count: 10, total_sum: 250, min: 1, percentile_99: 30 },
        ],
      },
      {
        type: 'server',
        id: 'yb.tabletserver',
        metrics: [
          { name: 'mem_tracker_Total', value: 1024 },
          { name: 'not_a_number', value: 'n/a' },
        ],
      },
    ]);

    const tablet = { metric_type: 'tablet', metric_id: 't-1', namespace: 'yugabyte', table_name: 'orders' };
    const server = { metric_type: 'server', metric_id: 'yb.tabletserver', namespace: '', table_name: '' };

    expect(parseServerMetrics(body)).toEqual([
      { ...tablet, metric_name: 'rows_inserted', metric_kind: 'counter', value: '42' },
      { ...tablet, metric_name: 'follower_lag_ms', metric_kind: 'gauge', value: '7' },
      { ...tablet, metric_name: 'handler_latency_read.total_count', metric_kind: 'counter', value: '10' },
      { ...tablet, metric_name: 'handler_latency_read.total_sum', metric_kind: 'counter', value: '250' },
      { ...server, metric_name: 'mem_tracker_Total', metric_kind: 'gauge', value: '1024' },
    ]);
  });

  it('should read YSQL count and sum entries', () => {
    const body = JSON.stringify([
      {
        type: 'server',
        id: 'yb.ysqlserver',
        metrics: [{ name: 'handler_latency_yb_ysqlserver_SQLProcessor_SelectStmt', count: 3, sum: 900, rows: 12 }],
      },
    ]);

    expect(parseServerMetrics(body).map((row) => [row.metric_name, row.value])).toEqual([
      ['handler_latency_yb_ysqlserver_SQLProcessor_SelectStmt.count', '3'],
      ['handler_latency_yb_ysqlserver_SQLProcessor_SelectStmt.sum', '900'],
      ['handler_latency_yb_ysqlserver_SQLProcessor_SelectStmt.rows', '12'],
    ]);
  });

  it('should reject bodies that are not a metrics array', () => {
    expect(() => parseServerMetrics('<html></html>')).toThrow(PayloadShapeError);
    expect(() => parseServerMetrics('{}')).toThrow('expected metrics response to be an array');
  });
});

describe('isGaugeMetric', () => {
  it('should know catalogued names and prefixes', () => {
    expect(isGaugeMetric('follower_lag_ms')).toBe(true);
    expect(isGaugeMetric('threads_running_thread_pool')).toBe(true);
    expect(isGaugeMetric('rows_inserted')).toBe(false);
  });
});
