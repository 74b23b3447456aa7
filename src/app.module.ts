import { Module } from '@nestjs/common';
import { CommandsModule } from './commands/commands.module';
import { ConfigModule } from './config/config.module';

@Module({
  imports: [ConfigModule, CommandsModule],
})
export class AppModule {}
