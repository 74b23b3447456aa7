import { Socket } from 'node:net';
import { HostProbe } from '../common/interfaces/host-probe.interface';

export class TcpHostProbe implements HostProbe {
  isReachable(host: string, port: number, timeoutMs: number): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = new Socket();
      const finish = (reachable: boolean) => {
        socket.destroy();
        resolve(reachable);
      };

      socket.setTimeout(timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
      socket.connect(port, host);
    });
  }
}
