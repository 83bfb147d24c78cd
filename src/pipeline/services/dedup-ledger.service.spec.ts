import { Logger } from '@nestjs/common';
import { LedgerCorruptError } from '../errors/pipeline.errors';
import { DedupLedgerService } from './dedup-ledger.service';
import { FileLedgerBackend, MemoryLedgerBackend } from './ledger-backend';

describe('DedupLedgerService', () => {
  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('reports ids marked seen and keeps the first-seen timestamp', async () => {
    const backend = new MemoryLedgerBackend();
    const ledger = new DedupLedgerService(backend);
    await ledger.load();

    ledger.markSeen(['a', 'b'], new Date('2026-10-01T00:00:00.000Z'));
    const added = ledger.markSeen(
      ['b', 'c'],
      new Date('2026-10-02T00:00:00.000Z'),
    );

    expect(added).toBe(1);
    expect(ledger.contains('a')).toBe(true);
    expect(ledger.contains('z')).toBe(false);
    await ledger.flush(new Date('2026-10-03T00:00:00.000Z'));
    expect(backend.snapshot()).toEqual({
      a: '2026-10-01T00:00:00.000Z',
      b: '2026-10-01T00:00:00.000Z',
      c: '2026-10-02T00:00:00.000Z',
    });
  });

  it('prunes entries older than the horizon', async () => {
    const ledger = new DedupLedgerService(
      new MemoryLedgerBackend({
        old: '2026-01-01T00:00:00.000Z',
        fresh: '2026-10-10T00:00:00.000Z',
      }),
    );
    await ledger.load();

    expect(ledger.prune(new Date('2026-06-01T00:00:00.000Z'))).toBe(1);
    expect(ledger.contains('old')).toBe(false);
    expect(ledger.contains('fresh')).toBe(true);
  });

  it('drops expired entries when flushing', async () => {
    const backend = new MemoryLedgerBackend({
      stale: '2026-01-01T00:00:00.000Z',
    });
    const ledger = new DedupLedgerService(backend);
    await ledger.load();
    ledger.markSeen(['new'], new Date('2026-10-18T00:00:00.000Z'));

    await ledger.flush(new Date('2026-10-18T00:00:00.000Z'));

    expect(backend.snapshot()).toEqual({ new: '2026-10-18T00:00:00.000Z' });
    expect(backend.saveCount).toBe(1);
  });

  it('rereads the backend on every load', async () => {
    const backend = new MemoryLedgerBackend({ a: '2026-10-17T00:00:00.000Z' });
    const ledger = new DedupLedgerService(backend);
    await ledger.load();

    await backend.save(
      new Map([
        ['a', '2026-10-17T00:00:00.000Z'],
        ['b', '2026-10-18T00:00:00.000Z'],
      ]),
    );
    await ledger.load();

    expect(ledger.contains('b')).toBe(true);
    expect(ledger.size).toBe(2);
  });

  it('refuses to answer before load', () => {
    const ledger = new DedupLedgerService(new MemoryLedgerBackend());

    expect(() => ledger.contains('a')).toThrow('used before load');
  });
});

describe('FileLedgerBackend', () => {
  const storage = {
    readJson: jest.fn(),
    writeJsonAtomic: jest.fn(),
  };
  const backend = new FileLedgerBackend(
    storage as never,
    '/data/state/seen_posts.json',
  );

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('treats a missing ledger as empty', async () => {
    storage.readJson.mockResolvedValue({ status: 'missing' });

    expect((await backend.load()).size).toBe(0);
  });

  it('raises LedgerCorruptError for unparsable content', async () => {
    storage.readJson.mockResolvedValue({
      status: 'invalid',
      error: new SyntaxError('Unexpected end of JSON input'),
    });

    await expect(backend.load()).rejects.toBeInstanceOf(LedgerCorruptError);
  });

  it('raises LedgerCorruptError for a wrong shape or bad timestamp', async () => {
    storage.readJson.mockResolvedValueOnce({ status: 'ok', value: [1, 2] });
    storage.readJson.mockResolvedValueOnce({
      status: 'ok',
      value: { entries: { a: 'not-a-date' } },
    });

    await expect(backend.load()).rejects.toBeInstanceOf(LedgerCorruptError);
    await expect(backend.load()).rejects.toThrow('invalid timestamp for id a');
  });

  it('persists entries through an atomic write', async () => {
    storage.writeJsonAtomic.mockResolvedValue(undefined);

    await backend.save(new Map([['a', '2026-10-18T00:00:00.000Z']]));

    expect(storage.writeJsonAtomic).toHaveBeenCalledWith(
      '/data/state/seen_posts.json',
      expect.objectContaining({
        version: 1,
        entries: { a: '2026-10-18T00:00:00.000Z' },
      }),
    );
  });
});
