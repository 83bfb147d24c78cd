import { Injectable, Logger } from '@nestjs/common';
import {
  CLASSIFY_CHUNK_SIZE,
  CLASSIFY_CONCURRENCY,
  CLASSIFY_TEXT_MAX_CHARS,
  TOPIC_DESCRIPTION,
} from '../config/pipeline.constants';
import { ClassificationUnavailableError } from '../errors/pipeline.errors';
import {
  buildClassifySystemPrompt,
  buildClassifyUserPrompt,
} from '../prompts/classify.prompt';
import {
  ClassificationOutcome,
  FailedChunk,
  LlmResult,
  Post,
} from '../types/pipeline.types';
import { mapWithConcurrency } from '../utils/concurrency.util';
import { truncate } from '../utils/text.util';
import { LlmClientService } from './llm-client.service';

interface ChunkVerdict {
  relevant: number[];
  urgent: number[];
}

export function chunkPosts<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}

/** Distinct integer ordinals in `1..max`; numeric strings are accepted. */
export function readOrdinals(value: unknown, max: number): number[] | null {
  if (!Array.isArray(value)) {
    return null;
  }
  const out: number[] = [];
  for (const item of value) {
    const ordinal =
      typeof item === 'number'
        ? item
        : typeof item === 'string' && item.trim()
          ? Number(item)
          : Number.NaN;
    if (
      Number.isInteger(ordinal) &&
      ordinal >= 1 &&
      ordinal <= max &&
      !out.includes(ordinal)
    ) {
      out.push(ordinal);
    }
  }
  return out;
}

@Injectable()
export class PostClassifierService {
  private readonly logger = new Logger(PostClassifierService.name);

  constructor(private readonly llm: LlmClientService) {}

  /**
   * Splits `posts` into order-preserving chunks and asks for relevant and
   * urgent ordinals per chunk. A chunk that still fails after retries
   * contributes nothing and is recorded in `failedChunks`.
   */
  async classify(
    posts: Post[],
    chunkSize = CLASSIFY_CHUNK_SIZE,
    concurrency = CLASSIFY_CONCURRENCY,
  ): Promise<ClassificationOutcome> {
    const startedAt = Date.now();
    const chunks = chunkPosts(posts, chunkSize);
    this.logger.log(
      `classify start: posts=${posts.length} chunks=${chunks.length} chunkSize=${chunkSize} concurrency=${concurrency}`,
    );

    const relevantIds = new Set<string>();
    const urgentIds = new Set<string>();
    const failedChunks: FailedChunk[] = [];
    let transportFailures = 0;
    const systemPrompt = buildClassifySystemPrompt(TOPIC_DESCRIPTION);

    await mapWithConcurrency(chunks, concurrency, async (chunk, index) => {
      const result = await this.classifyChunk(systemPrompt, chunk, index + 1);
      switch (result.kind) {
        case 'ok':
          for (const ordinal of result.value.relevant) {
            relevantIds.add(chunk[ordinal - 1].id);
          }
          for (const ordinal of result.value.urgent) {
            if (result.value.relevant.includes(ordinal)) {
              urgentIds.add(chunk[ordinal - 1].id);
            }
          }
          return;
        case 'parse_failure':
          failedChunks.push(
            this.failure(index + 1, chunk, 'unparsable response'),
          );
          return;
        case 'transport_failure':
          transportFailures += 1;
          failedChunks.push(
            this.failure(
              index + 1,
              chunk,
              `transport failure status=${result.status} ${result.error}`.trim(),
            ),
          );
          return;
      }
    });

    failedChunks.sort((a, b) => a.index - b.index);
    if (chunks.length > 0 && transportFailures === chunks.length) {
      this.logger.error(
        `classify aborted: all ${chunks.length} chunk(s) failed to reach the classification service`,
      );
      throw new ClassificationUnavailableError(chunks.length);
    }

    this.logger.log(
      `classify done: relevant=${relevantIds.size} urgent=${urgentIds.size} failedChunks=${failedChunks.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return {
      relevantIds,
      urgentIds,
      chunkCount: chunks.length,
      failedChunks,
    };
  }

  private async classifyChunk(
    systemPrompt: string,
    chunk: Post[],
    chunkNumber: number,
  ): Promise<LlmResult<ChunkVerdict>> {
    const userPrompt = buildClassifyUserPrompt(
      chunk.map((post, i) => ({
        ordinal: i + 1,
        author: post.author.username,
        text: truncate(post.text, CLASSIFY_TEXT_MAX_CHARS),
      })),
    );
    const result = await this.llm.generateStructured(
      systemPrompt,
      userPrompt,
      `classify chunk ${chunkNumber}`,
      (value) => {
        const relevant = readOrdinals(value.relevant, chunk.length);
        if (!relevant) {
          return null;
        }
        return {
          relevant,
          urgent: readOrdinals(value.urgent, chunk.length) ?? [],
        };
      },
    );
    if (result.kind !== 'ok') {
      this.logger.warn(
        `classify chunk failed: chunk=${chunkNumber} posts=${chunk.length} kind=${result.kind} attempts=${result.attempts}`,
      );
    }
    return result;
  }

  private failure(index: number, chunk: Post[], reason: string): FailedChunk {
    return { index, postIds: chunk.map((post) => post.id), reason };
  }
}
