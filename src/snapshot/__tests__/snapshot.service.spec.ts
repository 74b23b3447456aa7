import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { SnapshotNotFoundError, SnapshotWriteError } from '../../common/errors/clusterscope.errors';
import { HOST_PROBE } from '../../common/interfaces/host-probe.interface';
import { NODE_HTTP_CLIENT } from '../../common/interfaces/node-http-port.interface';
import { SNAPSHOT_STORE } from '../../common/interfaces/snapshot-store-port.interface';
import { EndpointKind } from '../../common/types/endpoint-kind';
import { CollectorService } from '../../collector/collector.service';
import { TargetResolverService } from '../../resolver/target-resolver.service';
import { MemoryAdapter } from '../../storage/adapters/memory.adapter';
import { FakeHostProbe, FakeHttpClient, collectorConfig } from '../../../test/test-utils';
import { SnapshotService, kindsForCapture } from '../snapshot.service';

describe('kindsForCapture', () => {
  it('should skip the object detail kinds without an id', () => {
    const kinds = kindsForCapture({});

    expect(kinds).toHaveLength(18);
    expect(kinds).not.toContain(EndpointKind.TABLE_DETAIL);
    expect(kinds).not.toContain(EndpointKind.TABLET_DETAIL);
  });

  it('should skip threads when asked to', () => {
    const kinds = kindsForCapture({ disableThreads: true });

    expect(kinds).toHaveLength(17);
    expect(kinds).not.toContain(EndpointKind.THREADS);
  });

  it('should capture every kind when an object id is given', () => {
    expect(kindsForCapture({ uuid: '000033e8000030008000000000004000' })).toHaveLength(20);
  });
});

describe('SnapshotService', () => {
  let service: SnapshotService;
  let resolver: TargetResolverService;
  let store: MemoryAdapter;
  let http: FakeHttpClient;

  beforeEach(async () => {
    store = new MemoryAdapter();
    await store.initialize();
    http = new FakeHttpClient({
      'http://10.0.0.1:7000/api/v1/version': {
        status: 200,
        bodyText: '{"git_hash":"abc","version_number":"2.11.2.0","build_number":"89"}',
      },
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SnapshotService,
        CollectorService,
        TargetResolverService,
        { provide: ConfigService, useValue: new ConfigService({ collector: collectorConfig({ hosts: ['10.0.0.1'] }) }) },
        { provide: NODE_HTTP_CLIENT, useValue: http },
        { provide: HOST_PROBE, useValue: new FakeHostProbe() },
        { provide: SNAPSHOT_STORE, useValue: store },
      ],
    }).compile();

    service = module.get<SnapshotService>(SnapshotService);
    resolver = module.get<TargetResolverService>(TargetResolverService);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write one record set per captured kind under a new number', async () => {
    const { entry, kinds } = await service.capture(resolver.resolve(), { comment: 'baseline', disableThreads: true });

    expect(entry.number).toBe(1);
    expect(entry.comment).toBe('baseline');
    expect(kinds).toHaveLength(17);
    expect(await store.listKinds(1)).toHaveLength(17);
    expect(await service.listSnapshots()).toEqual([entry]);
  });

  it('should keep synthetic records for hosts that returned nothing', async () => {
    await service.capture(resolver.resolve(), { comment: '' });

    const pass = await service.loadKind(1, EndpointKind.VERSIONS);

    expect(pass.records.map((record) => [record.hostname_port, record.synthetic])).toEqual([
      ['10.0.0.1:7000', false],
      ['10.0.0.1:9000', true],
    ]);
    expect(pass.records[0].fields.version_number).toBe('2.11.2.0');
    expect(pass.timestamp).toBe(pass.records[0].timestamp);
  });

  it('should stop at a failed write and leave the partial snapshot in place', async () => {
    const write = store.writeKind.bind(store);
    jest.spyOn(store, 'writeKind').mockImplementation(async (snapshot, kind, records) => {
      if (kind === EndpointKind.MASTERS) {
        throw new SnapshotWriteError(`${snapshot}/${kind}.csv`, 'disk full');
      }
      return write(snapshot, kind, records);
    });

    const failure = service.capture(resolver.resolve(), { comment: 'partial' });

    await expect(failure).rejects.toThrow(SnapshotWriteError);
    await expect(failure).rejects.toMatchObject({ exitCode: 5, message: 'Failed to write 1/masters.csv: disk full' });
    expect((await service.listSnapshots()).map((entry) => [entry.number, entry.comment])).toEqual([[1, 'partial']]);
    expect(await store.listKinds(1)).toEqual([EndpointKind.ENTITIES, EndpointKind.METRICS]);
    const metrics = await service.loadKind(1, EndpointKind.METRICS);
    expect(metrics.records.map((record) => [record.hostname_port, record.synthetic])).toEqual([
      ['10.0.0.1:7000', true],
      ['10.0.0.1:9000', true],
    ]);
  });

  it('should fail to load a kind the snapshot skipped', async () => {
    await service.capture(resolver.resolve(), { comment: '', disableThreads: true });

    await expect(service.loadKind(1, EndpointKind.THREADS)).rejects.toThrow(SnapshotNotFoundError);
  });

  it('should collect live passes in the order asked without storing them', async () => {
    const passes = await service.collectLive(resolver.resolve(), [EndpointKind.VERSIONS, EndpointKind.GFLAGS]);

    expect(passes.map((pass) => pass.kind)).toEqual([EndpointKind.VERSIONS, EndpointKind.GFLAGS]);
    expect(await service.listSnapshots()).toEqual([]);
  });
});
