import { Injectable, Logger } from '@nestjs/common';
import { ANALYSIS_DIR } from '../config/pipeline.constants';
import {
  AnalysisResult,
  ClassificationOutcome,
  DetailLevel,
  Post,
  StoredAnalysis,
  StoredSnapshot,
  SummaryOutcome,
} from '../types/pipeline.types';
import { renderNarrative } from '../utils/narrative.util';
import { PipelineStorageService } from './pipeline-storage.service';

export interface AnalysisInput {
  source: StoredSnapshot;
  posts: Post[];
  windowHours: number | null;
  classification: ClassificationOutcome;
  summary: SummaryOutcome;
  detailLevel: DetailLevel;
  model: string;
}

@Injectable()
export class AnalysisWriterService {
  private readonly logger = new Logger(AnalysisWriterService.name);

  constructor(private readonly storage: PipelineStorageService) {}

  build(input: AnalysisInput, analyzedAt: Date = new Date()): AnalysisResult {
    const known = new Set(input.source.snapshot.posts.map((post) => post.id));
    const relevantIds = input.posts
      .map((post) => post.id)
      .filter(
        (id) => known.has(id) && input.classification.relevantIds.has(id),
      );
    const urgentIds = relevantIds.filter((id) =>
      input.classification.urgentIds.has(id),
    );
    const byId = new Map(input.posts.map((post) => [post.id, post]));

    return {
      analyzedAt: analyzedAt.toISOString(),
      sourceFiles: [input.source.file],
      sourceCapturedAt: input.source.snapshot.capturedAt,
      windowHours: input.windowHours,
      model: input.model,
      detailLevel: input.detailLevel,
      postCount: input.posts.length,
      relevantIds,
      urgentIds,
      urgentPosts: urgentIds.flatMap((id) => {
        const post = byId.get(id);
        return post
          ? [
              {
                id,
                author: post.author.username,
                text: post.text,
                url: post.url,
              },
            ]
          : [];
      }),
      narrativeText: renderNarrative(input.summary.narrative),
      narrativeDegraded: input.summary.degraded,
      summaryOmittedPosts: input.summary.omittedCount,
      failedChunks: input.classification.failedChunks,
    };
  }

  async write(
    input: AnalysisInput,
    analyzedAt: Date = new Date(),
  ): Promise<StoredAnalysis> {
    await this.storage.ensureWritable(ANALYSIS_DIR);
    const result = this.build(input, analyzedAt);
    const file = await this.storage.saveAnalysis(result);
    this.logger.log(
      `analysis saved: file=${file} relevant=${result.relevantIds.length} urgent=${result.urgentIds.length} omitted=${result.summaryOmittedPosts} failedChunks=${result.failedChunks.length}`,
    );
    return { file, result };
  }
}
