import { Injectable, Logger } from '@nestjs/common';
import { SUMMARY_INSTRUCTION } from '../config/pipeline.constants';
import {
  AggregationOutcome,
  Period,
  ReportEntry,
  StoredAnalysis,
} from '../types/pipeline.types';
import { isWithinPeriod } from '../utils/date.util';
import { parseNarrativeEntries } from '../utils/narrative.util';
import { normalizeLink } from '../utils/text.util';
import { PipelineStorageService } from './pipeline-storage.service';
import { SummarizerService } from './summarizer.service';

/**
 * Keeps one entry per normalized link. A later entry replaces the kept one
 * only when its description is strictly longer; the kept entry stays at
 * the position where the link was first seen.
 */
function codePointLength(text: string): number {
  return [...text].length;
}

export function dedupeEntries(entries: ReportEntry[]): ReportEntry[] {
  const out: ReportEntry[] = [];
  const indexByKey = new Map<string, number>();
  for (const entry of entries) {
    const key = normalizeLink(entry.link);
    if (!key) {
      continue;
    }
    const index = indexByKey.get(key);
    if (index === undefined) {
      indexByKey.set(key, out.length);
      out.push(entry);
    } else if (
      codePointLength(entry.description) >
      codePointLength(out[index].description)
    ) {
      out[index] = entry;
    }
  }
  return out;
}

/** Results whose source capture falls in the period, earliest first. */
export function selectResults(
  all: StoredAnalysis[],
  period: Pick<Period, 'start' | 'end'>,
): StoredAnalysis[] {
  return all
    .filter((stored) => isWithinPeriod(stored.result.sourceCapturedAt, period))
    .sort(
      (a, b) =>
        Date.parse(a.result.sourceCapturedAt) -
          Date.parse(b.result.sourceCapturedAt) ||
        a.file.localeCompare(b.file),
    );
}

@Injectable()
export class AggregatorService {
  private readonly logger = new Logger(AggregatorService.name);

  constructor(
    private readonly storage: PipelineStorageService,
    private readonly summarizer: SummarizerService,
  ) {}

  collectEntries(results: StoredAnalysis[]): ReportEntry[] {
    return dedupeEntries(
      results.flatMap((stored) =>
        parseNarrativeEntries(stored.result.narrativeText),
      ),
    );
  }

  async aggregate(
    period: Period,
    instruction: string = SUMMARY_INSTRUCTION,
  ): Promise<AggregationOutcome> {
    const startedAt = Date.now();
    const results = selectResults(await this.storage.loadAllAnalyses(), period);
    const entries = this.collectEntries(results);
    this.logger.log(
      `aggregate start: scope=${period.scope} period=${period.label} results=${results.length} entries=${entries.length}`,
    );

    const { narrative, resynthesized } = await this.summarizer.resynthesize(
      entries,
      instruction,
    );
    this.logger.log(
      `aggregate done: period=${period.label} entries=${entries.length} resynthesized=${resynthesized} elapsedMs=${Date.now() - startedAt}`,
    );
    return {
      period,
      entries,
      sourceRefs: results.map((stored) => stored.file),
      narrative,
      resynthesized,
    };
  }
}
