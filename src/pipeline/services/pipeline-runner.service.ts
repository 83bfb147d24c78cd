import { Injectable, Logger } from '@nestjs/common';
import {
  SUMMARY_DETAIL,
  SUMMARY_INSTRUCTION,
} from '../config/pipeline.constants';
import { ArtifactNotFoundError } from '../errors/pipeline.errors';
import {
  ClassifySummary,
  CollectSummary,
  FetchOptions,
  Period,
  Post,
  ReportScope,
  ReportSummary,
  StoredSnapshot,
} from '../types/pipeline.types';
import {
  computeAgeHours,
  currentPeriod,
  parsePeriod,
} from '../utils/date.util';
import { AggregatorService } from './aggregator.service';
import { AnalysisWriterService } from './analysis-writer.service';
import { LlmClientService } from './llm-client.service';
import { NotifierService } from './notifier.service';
import { PipelineStorageService } from './pipeline-storage.service';
import { PostClassifierService } from './post-classifier.service';
import {
  defaultFetchOptions,
  PostFetcherService,
} from './post-fetcher.service';
import {
  reportFromAggregation,
  reportFromAnalysis,
  ReportWriterService,
} from './report-writer.service';
import { SummarizerService } from './summarizer.service';

export interface ClassifyRequest {
  windowHours?: number;
  snapshotFile?: string;
}

export interface RunAllSummary {
  collect: CollectSummary;
  classify: ClassifySummary;
  report: ReportSummary;
}

/**
 * Resolves a period label for `scope`, or the period containing `now` when
 * no label is given. Returns null for a label that does not parse.
 */
export function resolvePeriod(
  scope: Exclude<ReportScope, 'single'>,
  raw: string | undefined,
  now: Date = new Date(),
): Period | null {
  return raw ? parsePeriod(scope, raw) : currentPeriod(scope, now);
}

/**
 * Posts created within `windowHours` before the capture time. Posts without
 * a parsable creation time stay in.
 */
export function restrictToWindow(
  posts: Post[],
  capturedAt: string,
  windowHours: number,
): Post[] {
  const reference = new Date(capturedAt);
  return posts.filter((post) => {
    const age = computeAgeHours(post.createdAt, reference);
    return age === null || age <= windowHours;
  });
}

@Injectable()
export class PipelineRunnerService {
  private readonly logger = new Logger(PipelineRunnerService.name);
  private readonly inFlightCollects = new Map<
    string,
    Promise<CollectSummary>
  >();
  private readonly inFlightClassifies = new Map<
    string,
    Promise<ClassifySummary>
  >();
  private readonly inFlightReports = new Map<string, Promise<ReportSummary>>();

  constructor(
    private readonly fetcher: PostFetcherService,
    private readonly classifier: PostClassifierService,
    private readonly summarizer: SummarizerService,
    private readonly analysisWriter: AnalysisWriterService,
    private readonly aggregator: AggregatorService,
    private readonly reportWriter: ReportWriterService,
    private readonly notifier: NotifierService,
    private readonly storage: PipelineStorageService,
    private readonly llm: LlmClientService,
  ) {}

  async collect(
    options: FetchOptions = defaultFetchOptions(),
    now: Date = new Date(),
  ): Promise<CollectSummary> {
    return this.once(this.inFlightCollects, 'collect', () =>
      this.fetcher.collect(options, now),
    );
  }

  async classify(
    request: ClassifyRequest = {},
    now: Date = new Date(),
  ): Promise<ClassifySummary> {
    const lockKey = `${request.snapshotFile ?? 'latest'}:${request.windowHours ?? '-'}`;
    return this.once(this.inFlightClassifies, lockKey, () =>
      this.classifyCore(request, now),
    );
  }

  async report(
    scope: ReportScope,
    period?: Period,
    now: Date = new Date(),
  ): Promise<ReportSummary> {
    const lockKey = `${scope}:${period?.label ?? 'default'}`;
    return this.once(this.inFlightReports, lockKey, () =>
      scope === 'single'
        ? this.reportSingle(now)
        : this.reportPeriod(period ?? currentPeriod(scope, now), now),
    );
  }

  async runAll(now: Date = new Date()): Promise<RunAllSummary> {
    const startedAt = Date.now();
    this.logger.log('run-all start');
    const collect = await this.collect(defaultFetchOptions(), now);
    const classify = await this.classify(
      { snapshotFile: collect.snapshotFile },
      now,
    );
    const report = await this.report('single', undefined, now);
    this.logger.log(
      `run-all done: posts=${collect.postCount} relevant=${classify.relevantCount} report=${report.documentFile} elapsedMs=${Date.now() - startedAt}`,
    );
    return { collect, classify, report };
  }

  private async once<T>(
    inFlight: Map<string, Promise<T>>,
    lockKey: string,
    run: () => Promise<T>,
  ): Promise<T> {
    const existing = inFlight.get(lockKey);
    if (existing) {
      this.logger.log(`joining in-flight run: ${lockKey}`);
      return existing;
    }

    const task = run();
    inFlight.set(lockKey, task);
    try {
      return await task;
    } finally {
      if (inFlight.get(lockKey) === task) {
        inFlight.delete(lockKey);
      }
    }
  }

  private async loadSource(snapshotFile?: string): Promise<StoredSnapshot> {
    const source = snapshotFile
      ? await this.storage.loadSnapshot(snapshotFile)
      : await this.storage.loadLatestSnapshot();
    if (!source) {
      throw new ArtifactNotFoundError('snapshot', snapshotFile ?? 'latest');
    }
    return source;
  }

  private async classifyCore(
    request: ClassifyRequest,
    now: Date,
  ): Promise<ClassifySummary> {
    const startedAt = Date.now();
    const source = await this.loadSource(request.snapshotFile);
    const posts =
      request.windowHours === undefined
        ? source.snapshot.posts
        : restrictToWindow(
            source.snapshot.posts,
            source.snapshot.capturedAt,
            request.windowHours,
          );
    this.logger.log(
      `analyze start: snapshot=${source.file} posts=${posts.length} window=${request.windowHours ?? source.snapshot.windowHours}h`,
    );

    const classification = await this.classifier.classify(posts);
    const relevant = posts.filter((post) =>
      classification.relevantIds.has(post.id),
    );
    const summary = await this.summarizer.summarize(
      relevant,
      SUMMARY_DETAIL,
      SUMMARY_INSTRUCTION,
    );
    const stored = await this.analysisWriter.write(
      {
        source,
        posts,
        windowHours: request.windowHours ?? source.snapshot.windowHours,
        classification,
        summary,
        detailLevel: SUMMARY_DETAIL,
        model: this.llm.modelId(),
      },
      now,
    );
    await this.notifier.notifyUrgent(stored);

    this.logger.log(
      `analyze done: file=${stored.file} relevant=${stored.result.relevantIds.length} urgent=${stored.result.urgentIds.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return {
      analysisFile: stored.file,
      postCount: posts.length,
      relevantCount: stored.result.relevantIds.length,
      urgentCount: stored.result.urgentIds.length,
      failedChunks: stored.result.failedChunks.length,
      narrativeDegraded: stored.result.narrativeDegraded,
    };
  }

  private async reportSingle(now: Date): Promise<ReportSummary> {
    const latest = await this.storage.loadLatestAnalysis();
    if (!latest) {
      throw new ArtifactNotFoundError('analysis', 'latest');
    }
    return this.reportWriter.write(reportFromAnalysis(latest), now);
  }

  private async reportPeriod(
    period: Period,
    now: Date,
  ): Promise<ReportSummary> {
    const outcome = await this.aggregator.aggregate(
      period,
      SUMMARY_INSTRUCTION,
    );
    const report = reportFromAggregation(outcome);
    const summary = await this.reportWriter.write(report, now);
    await this.notifier.notifyHighlights(report, outcome.narrative.highlights);
    return summary;
  }
}
