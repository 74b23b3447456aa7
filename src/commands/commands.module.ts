import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CollectorConfig } from '../config/configuration';
import { DiffModule } from '../diff/diff.module';
import { ReportModule } from '../report/report.module';
import { ResolverModule } from '../resolver/resolver.module';
import { SnapshotModule } from '../snapshot/snapshot.module';
import { CommandRunnerService } from './command-runner.service';
import { EnterKeyGate, IntervalGate, OPERATION_GATE } from './operation-gate';
import { REPORT_OUTPUT, StdoutReportOutput } from './report-output';

@Module({
  imports: [ResolverModule, SnapshotModule, DiffModule, ReportModule],
  providers: [
    CommandRunnerService,
    {
      provide: REPORT_OUTPUT,
      useFactory: () => new StdoutReportOutput(),
    },
    {
      provide: OPERATION_GATE,
      useFactory: (configService: ConfigService) => {
        const intervalMs = configService.get<CollectorConfig>('collector')?.adhocIntervalMs ?? 0;
        return intervalMs > 0 ? new IntervalGate(intervalMs) : new EnterKeyGate();
      },
      inject: [ConfigService],
    },
  ],
  exports: [CommandRunnerService],
})
export class CommandsModule {}
