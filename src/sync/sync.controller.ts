import { Body, Controller, Get, HttpCode, MessageEvent, Param, ParseIntPipe, Post, Sse } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable, map } from 'rxjs';

import { MetricsAggregatorService, RecomputeReport } from '../metrics/metrics-aggregator.service.js';
import { TriggerSyncDto, WindowSyncDto } from './dto/trigger-sync.dto.js';
import { SyncEventsService } from './sync-events.service.js';
import { NextSyncInfo, SyncService, TriggerAck } from './sync.service.js';

@ApiTags('sync')
@Controller('sync')
export class SyncController {
  constructor(
    private readonly sync: SyncService,
    private readonly metrics: MetricsAggregatorService,
    private readonly events: SyncEventsService,
  ) {}

  // POST /sync  { "forceFull": true }
  @Post()
  @HttpCode(202)
  @ApiOperation({ summary: 'Start a full or incremental sync in the background' })
  @ApiBody({ type: TriggerSyncDto, required: false })
  triggerSync(@Body() body: TriggerSyncDto): Promise<TriggerAck> {
    return this.sync.trigger({ kind: body.forceFull ? 'full' : 'incremental', lookbackDays: body.lookbackDays });
  }

  @Post('recent')
  @HttpCode(202)
  @ApiOperation({ summary: 'Re-sync every PR updated in the last few days, nested data included' })
  @ApiBody({ type: WindowSyncDto, required: false })
  triggerWindowSync(@Body() body: WindowSyncDto): Promise<TriggerAck> {
    return this.sync.trigger({ kind: 'window', days: body.days });
  }

  @Post('pulls/:number')
  @HttpCode(202)
  @ApiOperation({ summary: 'Quick update of a single PR' })
  triggerQuickUpdate(@Param('number', ParseIntPipe) pullNumber: number): Promise<TriggerAck> {
    return this.sync.trigger({ kind: 'quick', pullNumber });
  }

  @Post('metrics')
  @ApiOperation({ summary: 'Recompute developer, reviewer, domain and interface rollups' })
  recomputeMetrics(): Promise<RecomputeReport[]> {
    return this.metrics.recomputeAll();
  }

  @Get('state')
  @ApiOperation({ summary: 'Last checkpoint and what the next sync will do' })
  getState(): Promise<NextSyncInfo> {
    return this.sync.describeNext();
  }

  @Sse('events')
  @ApiOperation({ summary: 'Server-sent stream of sync outcome notifications' })
  streamEvents(): Observable<MessageEvent> {
    return this.events.events$.pipe(map((event) => ({ type: event.type, data: event.data })));
  }
}
