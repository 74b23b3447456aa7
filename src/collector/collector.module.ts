import { Inject, Module, OnModuleDestroy } from '@nestjs/common';
import { HOST_PROBE } from '../common/interfaces/host-probe.interface';
import { NODE_HTTP_CLIENT, NodeHttpPort } from '../common/interfaces/node-http-port.interface';
import { ResolverModule } from '../resolver/resolver.module';
import { CollectorService } from './collector.service';
import { TcpHostProbe } from './tcp-host.probe';
import { UndiciHttpClient, createInsecureAgent } from './undici-http.client';

@Module({
  imports: [ResolverModule],
  providers: [
    CollectorService,
    {
      provide: NODE_HTTP_CLIENT,
      useFactory: () => new UndiciHttpClient(createInsecureAgent()),
    },
    {
      provide: HOST_PROBE,
      useFactory: () => new TcpHostProbe(),
    },
  ],
  exports: [CollectorService, ResolverModule],
})
export class CollectorModule implements OnModuleDestroy {
  constructor(@Inject(NODE_HTTP_CLIENT) private readonly http: NodeHttpPort) {}

  async onModuleDestroy() {
    await this.http.close();
  }
}
