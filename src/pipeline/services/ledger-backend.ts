import { LedgerCorruptError } from '../errors/pipeline.errors';
import { asRecord } from '../utils/record.util';
import { PipelineStorageService } from './pipeline-storage.service';

export const LEDGER_BACKEND = Symbol('LEDGER_BACKEND');

const LEDGER_VERSION = 1;

/** Post id -> ISO timestamp of the first time it was seen. */
export type LedgerEntries = Map<string, string>;

export interface LedgerBackend {
  readonly location: string;
  load(): Promise<LedgerEntries>;
  save(entries: LedgerEntries): Promise<void>;
}

export class FileLedgerBackend implements LedgerBackend {
  constructor(
    private readonly storage: PipelineStorageService,
    readonly location: string,
  ) {}

  async load(): Promise<LedgerEntries> {
    const result = await this.storage.readJson(this.location);
    if (result.status === 'missing') {
      return new Map();
    }
    if (result.status === 'invalid') {
      throw new LedgerCorruptError(this.location, result.error.message, {
        cause: result.error,
      });
    }

    const root = asRecord(result.value);
    const entries = asRecord(root?.entries);
    if (!entries) {
      throw new LedgerCorruptError(this.location, 'missing entries object');
    }
    const out: LedgerEntries = new Map();
    for (const [id, seenAt] of Object.entries(entries)) {
      if (typeof seenAt !== 'string' || Number.isNaN(Date.parse(seenAt))) {
        throw new LedgerCorruptError(
          this.location,
          `invalid timestamp for id ${id}`,
        );
      }
      out.set(id, seenAt);
    }
    return out;
  }

  async save(entries: LedgerEntries): Promise<void> {
    await this.storage.writeJsonAtomic(this.location, {
      version: LEDGER_VERSION,
      updated_at: new Date().toISOString(),
      entries: Object.fromEntries(entries),
    });
  }
}

export class MemoryLedgerBackend implements LedgerBackend {
  readonly location = 'memory';
  private stored: LedgerEntries;
  saveCount = 0;

  constructor(initial: Record<string, string> = {}) {
    this.stored = new Map(Object.entries(initial));
  }

  async load(): Promise<LedgerEntries> {
    return new Map(this.stored);
  }

  async save(entries: LedgerEntries): Promise<void> {
    this.stored = new Map(entries);
    this.saveCount += 1;
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.stored);
  }
}
