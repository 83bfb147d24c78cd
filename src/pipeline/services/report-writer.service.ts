import { Injectable, Logger } from '@nestjs/common';
import path from 'node:path';
import { REPORTS_DIR, WINDOW_HOURS } from '../config/pipeline.constants';
import {
  AggregationOutcome,
  Report,
  ReportScope,
  ReportSummary,
  StoredAnalysis,
} from '../types/pipeline.types';
import { formatFileStamp, formatZonedIso } from '../utils/date.util';
import {
  isNarrativeEmpty,
  parseNarrativeEntries,
  renderNarrative,
} from '../utils/narrative.util';
import { PipelineStorageService } from './pipeline-storage.service';

const HOUR_MS = 60 * 60 * 1000;

const TITLES: Record<ReportScope, string> = {
  single: 'Run digest',
  daily: 'Daily digest',
  weekly: 'Weekly digest',
  monthly: 'Monthly digest',
};

export function reportFromAnalysis(stored: StoredAnalysis): Report {
  const { result } = stored;
  const end = new Date(result.sourceCapturedAt);
  const start = new Date(
    end.getTime() - (result.windowHours ?? WINDOW_HOURS) * HOUR_MS,
  );
  const fileKey = formatFileStamp(end);
  return {
    scope: 'single',
    periodStart: formatZonedIso(start),
    periodEnd: formatZonedIso(end),
    periodLabel: fileKey,
    fileKey,
    narrativeText: result.narrativeText,
    entryCount: parseNarrativeEntries(result.narrativeText).length,
    sourceRefs: [stored.file],
    postCount: result.postCount,
    failedChunks: result.failedChunks.length,
    unclassifiedPosts: result.failedChunks.reduce(
      (sum, chunk) => sum + chunk.postIds.length,
      0,
    ),
    degraded: result.narrativeDegraded || result.failedChunks.length > 0,
  };
}

export function reportFromAggregation(outcome: AggregationOutcome): Report {
  const { period } = outcome;
  return {
    scope: period.scope,
    periodStart: formatZonedIso(period.start),
    periodEnd: formatZonedIso(period.end),
    periodLabel: period.label,
    fileKey: period.label,
    narrativeText: isNarrativeEmpty(outcome.narrative)
      ? ''
      : renderNarrative(outcome.narrative),
    entryCount: outcome.entries.length,
    sourceRefs: outcome.sourceRefs,
    postCount: null,
    failedChunks: 0,
    unclassifiedPosts: 0,
    degraded: outcome.entries.length > 0 && !outcome.resynthesized,
  };
}

/**
 * Writes a report as Markdown plus a JSON sidecar under
 * `reports/<scope>/<fileKey>`. The key comes from the period, so a rerun
 * for the same period replaces the previous files.
 */
@Injectable()
export class ReportWriterService {
  private readonly logger = new Logger(ReportWriterService.name);

  constructor(private readonly storage: PipelineStorageService) {}

  reportPaths(report: Pick<Report, 'scope' | 'fileKey'>): {
    document: string;
    sidecar: string;
  } {
    const dir = path.join(REPORTS_DIR, report.scope);
    return {
      document: path.join(dir, `${report.fileKey}.md`),
      sidecar: path.join(dir, `${report.fileKey}.json`),
    };
  }

  render(report: Report): string {
    const lines = [
      `# ${TITLES[report.scope]} ${report.periodLabel}`,
      '',
      `Period: ${report.periodStart} to ${report.periodEnd}`,
      `Entries: ${report.entryCount} | Sources: ${report.sourceRefs.length}`,
    ];
    if (report.postCount !== null) {
      lines.push(
        `Posts: ${report.postCount} | Failed chunks: ${report.failedChunks}`,
      );
    }
    lines.push('');
    const failureNote = `_Classification failed for ${report.failedChunks} chunk(s) covering ${report.unclassifiedPosts} post(s); they are listed under failed_chunks in the analysis file._`;
    if (report.narrativeText.trim()) {
      lines.push(report.narrativeText.trim());
    } else if (report.failedChunks > 0) {
      lines.push(failureNote);
    } else if (report.degraded) {
      lines.push(
        '_The narrative could not be generated for this run. Relevant post ids are kept in the analysis file._',
      );
    } else {
      lines.push(
        `_No entries were found in ${report.sourceRefs.length} source file(s) for this period._`,
      );
    }
    if (report.failedChunks > 0 && report.narrativeText.trim()) {
      lines.push('', failureNote);
    }
    if (
      report.scope !== 'single' &&
      report.degraded &&
      report.narrativeText.trim()
    ) {
      lines.push(
        '',
        '_Period synthesis was unavailable; entries are grouped as extracted._',
      );
    }
    return `${lines.join('\n')}\n`;
  }

  async write(
    report: Report,
    generatedAt: Date = new Date(),
  ): Promise<ReportSummary> {
    const paths = this.reportPaths(report);
    await this.storage.ensureWritable(path.dirname(paths.document));
    await this.storage.writeTextAtomic(paths.document, this.render(report));
    await this.storage.writeJsonAtomic(paths.sidecar, {
      scope: report.scope,
      period_start: report.periodStart,
      period_end: report.periodEnd,
      period_label: report.periodLabel,
      entry_count: report.entryCount,
      source_refs: report.sourceRefs,
      post_count: report.postCount,
      failed_chunks: report.failedChunks,
      degraded: report.degraded,
      generated_at: generatedAt.toISOString(),
    });
    this.logger.log(
      `report saved: scope=${report.scope} period=${report.periodLabel} entries=${report.entryCount} file=${paths.document}`,
    );
    return {
      scope: report.scope,
      periodLabel: report.periodLabel,
      documentFile: paths.document,
      sidecarFile: paths.sidecar,
      entryCount: report.entryCount,
      sourceCount: report.sourceRefs.length,
    };
  }
}
