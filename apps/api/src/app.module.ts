import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { JobsModule } from './jobs/jobs.module';
import { LogsModule } from './logs/logs.module';
import { SettingsModule } from './settings/settings.module';

@Module({
  imports: [SettingsModule, LogsModule, JobsModule],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
