import { Injectable, Logger } from '@nestjs/common';
import { constants as fsConstants, promises as fs } from 'node:fs';
import path from 'node:path';
import {
  ANALYSIS_DIR,
  FOLLOWINGS_CACHE_PATH,
  RAW_DIR,
} from '../config/pipeline.constants';
import { OutputNotWritableError } from '../errors/pipeline.errors';
import {
  AnalysisResult,
  FollowedAccount,
  RawSnapshot,
  StoredAnalysis,
  StoredSnapshot,
} from '../types/pipeline.types';
import {
  analysisFromFile,
  analysisToFile,
  snapshotFromFile,
  snapshotToFile,
} from '../utils/artifact.util';
import {
  formatFileStamp,
  formatPreciseFileStamp,
} from '../utils/date.util';
import { asRecord, asString } from '../utils/record.util';

interface FollowingsCache {
  handle: string;
  updatedAt: string;
  accounts: FollowedAccount[];
}

const SNAPSHOT_PREFIX = 'snapshot_';
const ANALYSIS_PREFIX = 'analysis_';

export type JsonReadResult =
  | { status: 'missing' }
  | { status: 'ok'; value: unknown }
  | { status: 'invalid'; error: Error };

@Injectable()
export class PipelineStorageService {
  private readonly logger = new Logger(PipelineStorageService.name);

  async ensureWritable(directory: string): Promise<void> {
    try {
      await fs.mkdir(directory, { recursive: true });
      await fs.access(directory, fsConstants.W_OK);
    } catch (error) {
      throw new OutputNotWritableError(directory, { cause: error });
    }
  }

  async saveSnapshot(snapshot: RawSnapshot): Promise<string> {
    const file = path.join(
      RAW_DIR,
      `${SNAPSHOT_PREFIX}${formatFileStamp(new Date(snapshot.capturedAt))}.json`,
    );
    await this.writeJsonAtomic(file, snapshotToFile(snapshot));
    return file;
  }

  async loadSnapshot(file: string): Promise<StoredSnapshot | null> {
    const snapshot = snapshotFromFile(await this.safeReadJson(file));
    return snapshot ? { file, snapshot } : null;
  }

  async loadLatestSnapshot(): Promise<StoredSnapshot | null> {
    const files = await this.listJsonFiles(RAW_DIR, SNAPSHOT_PREFIX);
    for (const file of files.reverse()) {
      const stored = await this.loadSnapshot(file);
      if (stored) {
        return stored;
      }
    }
    return null;
  }

  async saveAnalysis(result: AnalysisResult): Promise<string> {
    const file = path.join(
      ANALYSIS_DIR,
      `${ANALYSIS_PREFIX}${formatPreciseFileStamp(new Date(result.analyzedAt))}.json`,
    );
    await this.writeJsonAtomic(file, analysisToFile(result));
    return file;
  }

  async loadAnalysis(file: string): Promise<StoredAnalysis | null> {
    const result = analysisFromFile(await this.safeReadJson(file));
    return result ? { file, result } : null;
  }

  async loadAllAnalyses(): Promise<StoredAnalysis[]> {
    const files = await this.listJsonFiles(ANALYSIS_DIR, ANALYSIS_PREFIX);
    const out: StoredAnalysis[] = [];
    for (const file of files) {
      const stored = await this.loadAnalysis(file);
      if (stored) {
        out.push(stored);
      } else {
        this.logger.warn(`analysis skipped (unreadable): ${file}`);
      }
    }
    return out;
  }

  async loadLatestAnalysis(): Promise<StoredAnalysis | null> {
    const files = await this.listJsonFiles(ANALYSIS_DIR, ANALYSIS_PREFIX);
    for (const file of files.reverse()) {
      const stored = await this.loadAnalysis(file);
      if (stored) {
        return stored;
      }
    }
    return null;
  }

  async loadFollowingsCache(handle: string): Promise<FollowingsCache | null> {
    const record = asRecord(await this.safeReadJson(FOLLOWINGS_CACHE_PATH));
    if (!record || asString(record.handle) !== handle) {
      return null;
    }
    const accounts: FollowedAccount[] = [];
    for (const item of Array.isArray(record.accounts) ? record.accounts : []) {
      const account = asRecord(item);
      const username = asString(account?.username);
      if (username) {
        accounts.push({ username, name: asString(account?.name) || username });
      }
    }
    return { handle, updatedAt: asString(record.updated_at), accounts };
  }

  async saveFollowingsCache(cache: FollowingsCache): Promise<void> {
    await this.writeJsonAtomic(FOLLOWINGS_CACHE_PATH, {
      handle: cache.handle,
      updated_at: cache.updatedAt,
      accounts: cache.accounts,
    });
  }

  async readJson(filePath: string): Promise<JsonReadResult> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (this.errorCode(error) === 'ENOENT') {
        return { status: 'missing' };
      }
      return { status: 'invalid', error: this.toError(error) };
    }
    try {
      return { status: 'ok', value: JSON.parse(raw) as unknown };
    } catch (error) {
      return { status: 'invalid', error: this.toError(error) };
    }
  }

  async safeReadJson(filePath: string): Promise<unknown> {
    const result = await this.readJson(filePath);
    return result.status === 'ok' ? result.value : null;
  }

  async writeJsonAtomic(filePath: string, payload: unknown): Promise<void> {
    await this.writeTextAtomic(
      filePath,
      `${JSON.stringify(payload, null, 2)}\n`,
    );
  }

  async writeTextAtomic(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    const base = path.basename(filePath);
    const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(tmpPath, content, 'utf-8');
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }

  private async listJsonFiles(dir: string, prefix: string): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(dir);
    } catch (error) {
      if (this.errorCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return names
      .filter((name) => name.startsWith(prefix) && name.endsWith('.json'))
      .sort()
      .map((name) => path.join(dir, name));
  }

  private errorCode(error: unknown): string {
    const record = asRecord(error);
    return asString(record?.code);
  }

  private toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }
}
