import { Inject, Injectable, Logger } from '@nestjs/common';
import { LEDGER_RETENTION_DAYS } from '../config/pipeline.constants';
import { LEDGER_BACKEND, LedgerBackend, LedgerEntries } from './ledger-backend';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Set of post ids already captured by an earlier run. Reloaded from the
 * backend at the start of every fetch and written back once, through the
 * backend's atomic replace, at the end. A single run owns the ledger for
 * its lifetime.
 */
@Injectable()
export class DedupLedgerService {
  private readonly logger = new Logger(DedupLedgerService.name);
  private entries: LedgerEntries | null = null;

  constructor(
    @Inject(LEDGER_BACKEND) private readonly backend: LedgerBackend,
  ) {}

  get size(): number {
    return this.entries?.size ?? 0;
  }

  async load(): Promise<void> {
    this.entries = await this.backend.load();
    this.logger.log(
      `ledger loaded: entries=${this.entries.size} location=${this.backend.location}`,
    );
  }

  contains(id: string): boolean {
    return this.requireEntries().has(id);
  }

  markSeen(ids: Iterable<string>, at: Date = new Date()): number {
    const entries = this.requireEntries();
    const seenAt = at.toISOString();
    let added = 0;
    for (const id of ids) {
      if (!entries.has(id)) {
        entries.set(id, seenAt);
        added += 1;
      }
    }
    return added;
  }

  prune(olderThan: Date): number {
    const entries = this.requireEntries();
    const cutoff = olderThan.getTime();
    let removed = 0;
    for (const [id, seenAt] of entries) {
      if (Date.parse(seenAt) < cutoff) {
        entries.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  async flush(now: Date = new Date()): Promise<void> {
    const entries = this.requireEntries();
    const pruned = this.prune(
      new Date(now.getTime() - LEDGER_RETENTION_DAYS * DAY_MS),
    );
    await this.backend.save(entries);
    this.logger.log(`ledger saved: entries=${entries.size} pruned=${pruned}`);
  }

  private requireEntries(): LedgerEntries {
    if (!this.entries) {
      throw new Error('dedup ledger used before load()');
    }
    return this.entries;
  }
}
