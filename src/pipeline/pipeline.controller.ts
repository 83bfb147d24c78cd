import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Post,
} from '@nestjs/common';
import { SERVICE_NAME } from './config/pipeline.constants';
import {
  ClassifySummary,
  CollectSummary,
  ReportScope,
  ReportSummary,
} from './types/pipeline.types';
import {
  PipelineRunnerService,
  resolvePeriod,
  RunAllSummary,
} from './services/pipeline-runner.service';
import { defaultFetchOptions } from './services/post-fetcher.service';

const REPORT_SCOPES: ReportScope[] = ['single', 'daily', 'weekly', 'monthly'];

@Controller()
export class PipelineController {
  constructor(private readonly runner: PipelineRunnerService) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: SERVICE_NAME,
    };
  }

  @Post('pipeline/collect')
  @HttpCode(200)
  async collect(
    @Body('windowHours') windowHoursRaw?: unknown,
  ): Promise<CollectSummary> {
    const windowHours = this.parseWindowHours(windowHoursRaw);
    const options = defaultFetchOptions();
    return this.runner.collect(
      windowHours === undefined ? options : { ...options, windowHours },
    );
  }

  @Post('pipeline/classify')
  @HttpCode(200)
  async classify(
    @Body('windowHours') windowHoursRaw?: unknown,
    @Body('snapshot') snapshotRaw?: unknown,
  ): Promise<ClassifySummary> {
    return this.runner.classify({
      windowHours: this.parseWindowHours(windowHoursRaw),
      snapshotFile: this.parseOptionalString(snapshotRaw, 'snapshot'),
    });
  }

  @Post('pipeline/report')
  @HttpCode(200)
  async report(
    @Body('scope') scopeRaw?: unknown,
    @Body('period') periodRaw?: unknown,
  ): Promise<ReportSummary> {
    const scope = this.parseScope(scopeRaw);
    const periodLabel = this.parseOptionalString(periodRaw, 'period');
    if (scope === 'single') {
      if (periodLabel) {
        throw new BadRequestException('period is not used with scope single');
      }
      return this.runner.report(scope);
    }

    const period = resolvePeriod(scope, periodLabel);
    if (!period) {
      throw new BadRequestException(
        `period ${periodLabel} is not a valid ${scope} period`,
      );
    }
    return this.runner.report(scope, period);
  }

  @Post('pipeline/run-all')
  @HttpCode(200)
  async runAll(): Promise<RunAllSummary> {
    return this.runner.runAll();
  }

  private parseWindowHours(value: unknown): number | undefined {
    if (value == null || value === '') {
      return undefined;
    }

    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new BadRequestException('windowHours must be a positive number');
    }
    return parsed;
  }

  private parseScope(value: unknown): ReportScope {
    const scope = REPORT_SCOPES.find(
      (candidate) =>
        typeof value === 'string' && candidate === value.trim().toLowerCase(),
    );
    if (!scope) {
      throw new BadRequestException(
        `scope must be one of ${REPORT_SCOPES.join(', ')}`,
      );
    }
    return scope;
  }

  private parseOptionalString(
    value: unknown,
    fieldName: string,
  ): string | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    if (typeof value !== 'string') {
      throw new BadRequestException(`${fieldName} must be a string`);
    }
    return value.trim() || undefined;
  }
}
