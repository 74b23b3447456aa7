import { AddressInfo, Server, createServer } from 'node:net';
import { TcpHostProbe } from '../tcp-host.probe';

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe('TcpHostProbe', () => {
  const probe = new TcpHostProbe();

  it('should report a listening port as reachable', async () => {
    const server = createServer((socket) => socket.destroy());
    const port = await listen(server);

    try {
      expect(await probe.isReachable('127.0.0.1', port, 1000)).toBe(true);
    } finally {
      await close(server);
    }
  });

  it('should report a closed port as unreachable', async () => {
    const server = createServer();
    const port = await listen(server);
    await close(server);

    expect(await probe.isReachable('127.0.0.1', port, 1000)).toBe(false);
  });
});
