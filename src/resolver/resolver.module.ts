import { Module } from '@nestjs/common';
import { TargetResolverService } from './target-resolver.service';

@Module({
  providers: [TargetResolverService],
  exports: [TargetResolverService],
})
export class ResolverModule {}
