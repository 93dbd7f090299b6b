import { Controller, Get, Query } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { serverLogs } from './server-logs.store';

function parseIntParam(raw: string | undefined): number | undefined {
  const n = raw ? Number.parseInt(raw, 10) : NaN;
  return Number.isFinite(n) ? n : undefined;
}

@Controller('logs')
@ApiTags('logs')
export class LogsController {
  @Get()
  getLogs(@Query('afterId') afterIdRaw?: string, @Query('limit') limitRaw?: string) {
    const data = serverLogs.list({
      afterId: parseIntParam(afterIdRaw),
      limit: parseIntParam(limitRaw),
    });
    return { ok: true, ...data };
  }
}
