import { Logger } from '@nestjs/common';
import { Post, ReportEntry } from '../types/pipeline.types';
import { SummarizerService } from './summarizer.service';

const buildPost = (id: string, username: string): Post => ({
  id,
  author: { username, name: username },
  text: `text ${id}`,
  url: `https://x.com/${username}/status/${id}`,
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

const replyWith = (raw: Record<string, unknown>) =>
  jest.fn(
    async (
      _system: string,
      _user: string,
      _label: string,
      validate: (value: Record<string, unknown>) => unknown,
    ) => ({
      kind: 'ok',
      value: validate(raw),
      model: 'test-model',
      attempts: 1,
    }),
  );

const summaryItems = {
  items: [
    {
      ref: 2,
      category: 'products',
      description: 'Tool launched',
      rationale: 'Changes workflows',
    },
    {
      ref: 1,
      category: 'Models & Research',
      description: 'Model released',
      rationale: 'New state of the art',
    },
    { ref: 1, category: 'other', description: 'duplicate mention' },
    { ref: 9, category: 'other', description: 'out of range' },
  ],
};

describe('SummarizerService', () => {
  const posts = [buildPost('A', 'alice'), buildPost('B', 'bob')];

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('builds ordered sections with locally attached links and sources', async () => {
    const llm = { generateStructured: replyWith(summaryItems) };
    const service = new SummarizerService(llm as never);

    const outcome = await service.summarize(posts, 'standard', '');

    expect(outcome).toEqual({
      narrative: {
        highlights: [],
        sections: [
          {
            category: 'Models & Research',
            lines: [
              {
                description: 'Model released',
                link: 'https://x.com/alice/status/A',
                source: 'alice',
              },
            ],
          },
          {
            category: 'Products & Tools',
            lines: [
              {
                description: 'Tool launched',
                link: 'https://x.com/bob/status/B',
                source: 'bob',
              },
            ],
          },
        ],
      },
      relevantIds: ['A', 'B'],
      omittedCount: 0,
      degraded: false,
    });
  });

  it('counts and reports the relevant posts left out by the cap', async () => {
    const llm = { generateStructured: replyWith(summaryItems) };
    const service = new SummarizerService(llm as never);
    const busy = { ...buildPost('B', 'bob'), likeCount: 5 };

    const outcome = await service.summarize(
      [buildPost('A', 'alice'), busy],
      'standard',
      '',
      1,
    );

    expect(outcome.relevantIds).toEqual(['A', 'B']);
    expect(outcome.omittedCount).toBe(1);
    expect(outcome.narrative.sections).toEqual([
      {
        category: 'Models & Research',
        lines: [
          {
            description: 'Model released',
            link: 'https://x.com/bob/status/B',
            source: 'bob',
          },
        ],
      },
    ]);
    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      'summarize capped: relevant=2 max=1 omitted=1',
    );
  });

  it('drops attribution for terse output and adds rationale for analytic', async () => {
    const terse = await new SummarizerService({
      generateStructured: replyWith(summaryItems),
    } as never).summarize(posts, 'terse', '');
    const analytic = await new SummarizerService({
      generateStructured: replyWith(summaryItems),
    } as never).summarize(posts, 'analytic', '');

    expect(terse.narrative.sections[0].lines[0]).toEqual({
      description: 'Model released',
      link: 'https://x.com/alice/status/A',
    });
    expect(analytic.narrative.sections[0].lines[0]).toEqual({
      description: 'Model released',
      link: 'https://x.com/alice/status/A',
      source: 'alice',
      rationale: 'New state of the art',
    });
  });

  it('appends the steering instruction verbatim', async () => {
    const llm = { generateStructured: replyWith(summaryItems) };
    const service = new SummarizerService(llm as never);

    await service.summarize(posts, 'standard', 'Focus on open weights.');

    const systemPrompt: string = llm.generateStructured.mock.calls[0][0];
    expect(
      systemPrompt.endsWith('Additional instruction:\nFocus on open weights.'),
    ).toBe(true);
  });

  it('degrades to an empty narrative when generation fails', async () => {
    const llm = {
      generateStructured: jest.fn().mockResolvedValue({
        kind: 'transport_failure',
        status: 503,
        error: 'overloaded',
        attempts: 3,
      }),
    };
    const service = new SummarizerService(llm as never);

    const outcome = await service.summarize(posts, 'standard', '');

    expect(outcome).toEqual({
      narrative: { highlights: [], sections: [] },
      relevantIds: ['A', 'B'],
      omittedCount: 0,
      degraded: true,
    });
  });

  describe('resynthesize', () => {
    const entries: ReportEntry[] = [
      {
        link: 'https://example.com/model',
        description: 'Model released',
        category: 'Models & Research',
      },
      {
        link: 'https://example.com/tool',
        description: 'Tool launched',
        category: 'Products & Tools',
        source: 'bob',
      },
      {
        link: 'https://example.com/misc',
        description: 'Misc note',
        category: 'Other',
      },
    ];

    it('leads with highlights and keeps every entry in the sections', async () => {
      const llm = {
        generateStructured: replyWith({
          highlights: [{ ref: 2, description: 'Big tool launch' }],
          items: [{ ref: 1, category: 'research', description: 'Model refined' }],
        }),
      };
      const service = new SummarizerService(llm as never);

      const outcome = await service.resynthesize(entries, '');

      expect(outcome).toEqual({
        resynthesized: true,
        narrative: {
          highlights: [
            {
              description: 'Big tool launch',
              link: 'https://example.com/tool',
              source: 'bob',
            },
          ],
          sections: [
            {
              category: 'Models & Research',
              lines: [
                {
                  description: 'Model refined',
                  link: 'https://example.com/model',
                },
              ],
            },
            {
              category: 'Products & Tools',
              lines: [
                {
                  description: 'Tool launched',
                  link: 'https://example.com/tool',
                  source: 'bob',
                },
              ],
            },
            {
              category: 'Other',
              lines: [
                { description: 'Misc note', link: 'https://example.com/misc' },
              ],
            },
          ],
        },
      });
    });

    it('falls back to grouping the entries without highlights', async () => {
      const llm = {
        generateStructured: jest
          .fn()
          .mockResolvedValue({ kind: 'parse_failure', raw: '', attempts: 3 }),
      };
      const service = new SummarizerService(llm as never);

      const outcome = await service.resynthesize(entries, '');

      expect(outcome.resynthesized).toBe(false);
      expect(outcome.narrative.highlights).toEqual([]);
      expect(
        outcome.narrative.sections.map((section) => section.category),
      ).toEqual(['Models & Research', 'Products & Tools', 'Other']);
    });
  });
});
