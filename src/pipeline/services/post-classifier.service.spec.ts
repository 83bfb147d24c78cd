import { Logger } from '@nestjs/common';
import { ClassificationUnavailableError } from '../errors/pipeline.errors';
import { Post } from '../types/pipeline.types';
import {
  chunkPosts,
  PostClassifierService,
  readOrdinals,
} from './post-classifier.service';

const buildPost = (id: string, text: string): Post => ({
  id,
  author: { username: 'lab', name: 'Lab' },
  text,
  url: `https://x.com/lab/status/${id}`,
  createdAt: '2026-10-18T10:00:00.000Z',
  viewCount: 0,
  likeCount: 0,
  repostCount: 0,
  replyCount: 0,
  hasMedia: false,
  isReply: false,
  lang: 'en',
  provenance: 'followed',
});

const ok = <T>(value: T) => ({
  kind: 'ok' as const,
  value,
  model: 'test-model',
  attempts: 1,
});

describe('PostClassifierService', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('keeps relevant posts and discards urgency outside the relevant set', async () => {
    const llm = {
      generateStructured: jest
        .fn()
        .mockResolvedValue(ok({ relevant: [1, 3], urgent: [3, 2] })),
    };
    const service = new PostClassifierService(llm as never);

    const outcome = await service.classify(
      [
        buildPost('A', 'OpenAI ships X'),
        buildPost('B', 'lunch photo'),
        buildPost('C', 'OpenAI ships X'),
      ],
      40,
    );

    expect([...outcome.relevantIds]).toEqual(['A', 'C']);
    expect([...outcome.urgentIds]).toEqual(['C']);
    expect(outcome.chunkCount).toBe(1);
    expect(outcome.failedChunks).toEqual([]);
  });

  it('isolates a chunk that fails every retry', async () => {
    const llm = {
      generateStructured: jest.fn(async (_s: string, _u: string, label: string) => {
        if (label === 'classify chunk 2') {
          return {
            kind: 'transport_failure',
            status: 503,
            error: 'overloaded',
            attempts: 3,
          };
        }
        return label === 'classify chunk 1'
          ? ok({ relevant: [1], urgent: [] })
          : ok({ relevant: [2], urgent: [2] });
      }),
    };
    const service = new PostClassifierService(llm as never);
    const posts = ['p1', 'p2', 'p3', 'p4', 'p5', 'p6'].map((id) =>
      buildPost(id, `text ${id}`),
    );

    const outcome = await service.classify(posts, 2);

    expect(llm.generateStructured).toHaveBeenCalledTimes(3);
    expect([...outcome.relevantIds].sort()).toEqual(['p1', 'p6']);
    expect([...outcome.urgentIds]).toEqual(['p6']);
    expect(outcome.failedChunks).toEqual([
      {
        index: 2,
        postIds: ['p3', 'p4'],
        reason: 'transport failure status=503 overloaded',
      },
    ]);
  });

  it('raises when no chunk could reach the classification service', async () => {
    const llm = {
      generateStructured: jest.fn().mockResolvedValue({
        kind: 'transport_failure',
        status: 0,
        error: 'api key not configured',
        attempts: 0,
      }),
    };
    const service = new PostClassifierService(llm as never);

    await expect(
      service.classify([buildPost('1', 'a'), buildPost('2', 'b')], 1),
    ).rejects.toBeInstanceOf(ClassificationUnavailableError);
  });

  it('completes with an empty relevant set when every chunk is unparsable', async () => {
    const llm = {
      generateStructured: jest
        .fn()
        .mockResolvedValue({ kind: 'parse_failure', raw: '??', attempts: 3 }),
    };
    const service = new PostClassifierService(llm as never);

    const outcome = await service.classify(
      [buildPost('1', 'a'), buildPost('2', 'b')],
      1,
    );

    expect(outcome.relevantIds.size).toBe(0);
    expect(outcome.failedChunks.map((chunk) => chunk.reason)).toEqual([
      'unparsable response',
      'unparsable response',
    ]);
  });

  it('gives the same relevant set for any chunk size', async () => {
    const llm = {
      generateStructured: jest.fn(
        async (
          _system: string,
          userPrompt: string,
          _label: string,
          validate: (value: Record<string, unknown>) => unknown,
        ) => {
          const relevant = userPrompt
            .split('\n')
            .map((line) => line.match(/^\[(\d+)\] @\w+: (.*)$/))
            .filter((match): match is RegExpMatchArray => match !== null)
            .filter((match) => match[2].includes('model'))
            .map((match) => Number(match[1]));
          return ok(validate({ relevant, urgent: [] }));
        },
      ),
    };
    const service = new PostClassifierService(llm as never);
    const posts = [
      buildPost('1', 'new model weights'),
      buildPost('2', 'weekend hike'),
      buildPost('3', 'model card update'),
      buildPost('4', 'coffee'),
      buildPost('5', 'model eval results'),
    ];

    const whole = await service.classify(posts, 100);
    const chunked = await service.classify(posts, 2);

    expect([...chunked.relevantIds].sort()).toEqual(
      [...whole.relevantIds].sort(),
    );
    expect([...whole.relevantIds].sort()).toEqual(['1', '3', '5']);
  });

  it('makes no calls for an empty snapshot', async () => {
    const llm = { generateStructured: jest.fn() };
    const service = new PostClassifierService(llm as never);

    const outcome = await service.classify([], 40);

    expect(outcome.chunkCount).toBe(0);
    expect(llm.generateStructured).not.toHaveBeenCalled();
  });
});

describe('chunkPosts', () => {
  it('partitions in order without overlap', () => {
    expect(chunkPosts([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe('readOrdinals', () => {
  it('keeps distinct in-range integers', () => {
    expect(readOrdinals([1, '2', 2, 0, 5, 'x', 1.5], 4)).toEqual([1, 2]);
    expect(readOrdinals('1,2', 4)).toBeNull();
  });
});
