import {
  CatalogCorruptError,
  InvalidRequestError,
  SnapshotCorruptError,
  SnapshotNotFoundError,
  SnapshotWriteError,
  isClusterscopeError,
} from '../clusterscope.errors';

describe('ClusterscopeError', () => {
  it('should map each fatal error to its exit code', () => {
    expect(new InvalidRequestError('Invalid request').exitCode).toBe(2);
    expect(new SnapshotNotFoundError(7).exitCode).toBe(3);
    expect(new SnapshotNotFoundError(7, 'gflags').exitCode).toBe(3);
    expect(new SnapshotCorruptError(7, 'gflags', 'bad header').exitCode).toBe(4);
    expect(new CatalogCorruptError('snapshot.index', 'bad header').exitCode).toBe(4);
    expect(new SnapshotWriteError('7/gflags.csv', 'disk full').exitCode).toBe(5);
  });

  it('should describe what went wrong', () => {
    expect(new SnapshotNotFoundError(7, 'gflags').message).toBe("Snapshot 7 has no data for kind 'gflags'");
    expect(new SnapshotCorruptError(7, 'gflags', 'bad header').message).toBe(
      "Snapshot 7 kind 'gflags' cannot be read: bad header",
    );
    expect(new SnapshotWriteError('7/gflags.csv', 'disk full').message).toBe('Failed to write 7/gflags.csv: disk full');
  });

  it('should only recognise its own errors', () => {
    expect(isClusterscopeError(new SnapshotWriteError('x', 'y'))).toBe(true);
    expect(isClusterscopeError(new Error('boom'))).toBe(false);
    expect(isClusterscopeError('boom')).toBe(false);
  });
});
