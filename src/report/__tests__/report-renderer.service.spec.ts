import { MetricKindDiff, StructuredKindDiff } from '../../common/types/diff.types';
import { EndpointKind } from '../../common/types/endpoint-kind';
import { SHOW_EVERYTHING } from '../../diff/diff-filter';
import { T0, record, syntheticFields } from '../../../test/test-utils';
import { RenderOptions, ReportRendererService } from '../report-renderer.service';

const OPTIONS: RenderOptions = {
  ...SHOW_EVERYTHING,
  gauges: false,
  details: false,
  includeUnchanged: false,
  sqlLength: 80,
  logSeverity: 'WEF',
};

describe('ReportRendererService', () => {
  const renderer = new ReportRendererService();

  describe('renderCatalog', () => {
    it('should list snapshots in a fixed-width table', () => {
      expect(
        renderer.renderCatalog([
          { number: 1, timestamp: '2024-05-01T10:00:00.000Z', comment: 'before' },
          { number: 12, timestamp: '2024-05-01T11:00:00.000Z', comment: '' },
        ]),
      ).toEqual([
        'number  timestamp' + ' '.repeat(17) + 'comment',
        '------  ' + '-'.repeat(24) + '  -------',
        '     1  2024-05-01T10:00:00.000Z  before',
        '    12  2024-05-01T11:00:00.000Z',
      ]);
    });

    it('should say so when there is nothing to list', () => {
      expect(renderer.renderCatalog([])).toEqual(['No snapshots.']);
    });
  });

  describe('renderKindDiff', () => {
    it('should sum metric rows across collapsed entities when details are off', () => {
      const diff: MetricKindDiff = {
        kind: EndpointKind.NODE_EXPORTER,
        shape: 'metric',
        unavailableHosts: [],
        rows: [
          {
            hostname_port: '10.0.0.1:9300',
            entity: { labels: '{cpu="0"}' },
            name: 'node_cpu_seconds_total',
            gauge: false,
            beginValue: 100,
            endValue: 110,
            delta: 10,
            counterReset: false,
            elapsedSeconds: 10,
            rate: 1,
          },
          {
            hostname_port: '10.0.0.1:9300',
            entity: { labels: '{cpu="1"}' },
            name: 'node_cpu_seconds_total',
            gauge: false,
            beginValue: 200,
            endValue: 220,
            delta: 20,
            counterReset: false,
            elapsedSeconds: 10,
            rate: 2,
          },
        ],
      };

      expect(renderer.renderKindDiff(diff, OPTIONS)).toEqual([
        'node-exporter:',
        'hostname_port  metric_name' + ' '.repeat(13) + 'begin  end  delta  rate/s  note',
        '-------------  ----------------------  -----  ---  -----  ------  ----',
        '10.0.0.1:9300  node_cpu_seconds_total' + '    300' + '  330' + '     30' + '       3',
      ]);
    });

    it('should total unchanged tables into a metric before hiding unchanged rows', () => {
      const tableRow = (tableId: string, tableName: string, beginValue: number, endValue: number) => ({
        hostname_port: '10.0.0.1:9000',
        entity: { metric_type: 'table', metric_id: tableId, namespace: 'shop', table_name: tableName },
        name: 'rows_inserted',
        gauge: false,
        beginValue,
        endValue,
        delta: endValue - beginValue,
        counterReset: false,
        elapsedSeconds: 60,
        rate: (endValue - beginValue) / 60,
      });
      const diff: MetricKindDiff = {
        kind: EndpointKind.METRICS,
        shape: 'metric',
        unavailableHosts: [],
        rows: [tableRow('t1', 'orders', 100, 100), tableRow('t2', 'items', 1, 4)],
      };

      const lines = renderer.renderKindDiff(diff, OPTIONS);

      expect(lines).toHaveLength(4);
      expect(lines[3]).toBe('10.0.0.1:9000  table' + ' '.repeat(8) + 'rows_inserted    101  104      3   0.050');
    });

    it('should hide a metric whose collapsed deltas cancel out', () => {
      const gaugeRow = (tableId: string, beginValue: number, endValue: number) => ({
        hostname_port: '10.0.0.1:9000',
        entity: { metric_type: 'table', metric_id: tableId, namespace: 'shop', table_name: tableId },
        name: 'memory_usage',
        gauge: true,
        beginValue,
        endValue,
        delta: endValue - beginValue,
        counterReset: false,
        elapsedSeconds: 60,
        rate: (endValue - beginValue) / 60,
      });
      const diff: MetricKindDiff = {
        kind: EndpointKind.METRICS,
        shape: 'metric',
        unavailableHosts: [],
        rows: [gaugeRow('t1', 10, 15), gaugeRow('t2', 20, 15)],
      };

      expect(renderer.renderKindDiff(diff, { ...OPTIONS, gauges: true })).toEqual(['metrics:', '(no differences)']);
    });

    it('should show changed fields as old -> new and list hosts without data', () => {
      const diff: StructuredKindDiff = {
        kind: EndpointKind.GFLAGS,
        shape: 'structured',
        unavailableHosts: ['10.0.0.2:7000'],
        rows: [
          {
            hostname_port: '10.0.0.1:7000',
            key: { name: 'max_log_size' },
            change: 'changed',
            begin: { name: 'max_log_size', value: '256' },
            end: { name: 'max_log_size', value: '512' },
            changedFields: ['value'],
          },
        ],
      };

      expect(renderer.renderKindDiff(diff, OPTIONS)).toEqual([
        'gflags:',
        'hostname_port  change   name' + ' '.repeat(10) + 'value',
        '-------------  -------  ------------  ----------',
        '10.0.0.1:7000  changed  max_log_size  256 -> 512',
        'no data from: 10.0.0.2:7000',
      ]);
    });

    it('should mark a kind without differences', () => {
      const empty: StructuredKindDiff = { kind: EndpointKind.GFLAGS, shape: 'structured', unavailableHosts: [], rows: [] };

      expect(renderer.renderDiffs('Diff of snapshot 1 to snapshot 2', [empty], OPTIONS)).toEqual([
        'Diff of snapshot 1 to snapshot 2',
        '',
        'gflags:',
        '(no differences)',
      ]);
    });
  });

  describe('renderRecords', () => {
    it('should only print log lines of the wanted severities', () => {
      const line = (severity: string, message: string) =>
        record('10.0.0.1:7000', T0, {
          severity,
          log_time: '0501 10:00:01.123456',
          thread_id: '1234',
          source: 'log.cc:55',
          message,
        });

      const lines = renderer.renderRecords(
        EndpointKind.LOGS,
        T0,
        [line('I', 'started'), line('W', 'slow write'), line('E', 'disk full')],
        { ...OPTIONS, logSeverity: 'WE' },
      );

      expect(lines).toHaveLength(5);
      expect(lines[0]).toBe(`logs at ${T0}:`);
      expect(lines.slice(3).map((row) => row.split(/\s{2,}/)[1])).toEqual(['W', 'E']);
    });

    it('should cut statement text to the configured length', () => {
      const statement = record('10.0.0.1:13000', T0, {
        query_id: '1',
        query: 'select * from orders where id = 1',
        metric_name: 'calls',
        metric_kind: 'counter',
        value: '10',
      });

      const lines = renderer.renderRecords(EndpointKind.STATEMENTS, T0, [statement], { ...OPTIONS, sqlLength: 8 });

      expect(lines[3]).toBe(
        '10.0.0.1:13000  1' + ' '.repeat(9) + 'select *  calls' + ' '.repeat(8) + 'counter' + ' '.repeat(9) + '10',
      );
    });

    it('should note hosts that returned no data', () => {
      const lines = renderer.renderRecords(
        EndpointKind.GFLAGS,
        T0,
        [record('10.0.0.2:7000', T0, syntheticFields(EndpointKind.GFLAGS), true)],
        OPTIONS,
      );

      expect(lines).toEqual([`gflags at ${T0}:`, '(no records)', 'no data from: 10.0.0.2:7000']);
    });
  });
});
