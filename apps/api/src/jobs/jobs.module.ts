import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { NewsletterModule } from '../newsletter/newsletter.module';
import { JobsController } from './jobs.controller';
import { JobsScheduler } from './jobs.scheduler';
import { NewsletterJob } from './newsletter.job';

@Module({
  imports: [NewsletterModule, ScheduleModule.forRoot()],
  controllers: [JobsController],
  providers: [NewsletterJob, JobsScheduler],
  exports: [NewsletterJob],
})
export class JobsModule {}
