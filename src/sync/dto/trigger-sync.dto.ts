import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsInt, IsOptional, Max, Min } from 'class-validator';

export class TriggerSyncDto {
  @ApiPropertyOptional({ description: 'Ignore the checkpoint and scan the whole lookback window', example: false })
  @IsOptional()
  @IsBoolean()
  forceFull?: boolean;

  @ApiPropertyOptional({ description: 'Days of history a full pass fetches', example: 60 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(365)
  lookbackDays?: number;
}

export class WindowSyncDto {
  @ApiPropertyOptional({ description: 'Days of recently updated PRs to re-sync', example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(60)
  days?: number;
}
