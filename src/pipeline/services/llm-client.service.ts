import { Injectable, Logger } from '@nestjs/common';
import {
  AI_MAX_OUTPUT_TOKENS,
  AI_PROVIDER,
  AI_TIMEOUT_MS,
  RETRY_BASE_DELAY_MS,
  RETRY_JITTER_RATIO,
  RETRY_MAX_DELAY_MS,
  RETRY_MAX_RETRIES,
} from '../config/pipeline.constants';
import { LlmResult } from '../types/pipeline.types';
import { asRecord, asString } from '../utils/record.util';
import { RetryPolicy, runWithRetry, sleep } from '../utils/retry.util';
import { cleanText } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);
const ANTHROPIC_VERSION = '2023-06-01';
const ANTHROPIC_DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';

type AttemptResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'parse_failure'; raw: string }
  | {
      kind: 'transport_failure';
      status: number;
      error: string;
      retryable: boolean;
    };

interface ProviderRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
  extractText: (json: Record<string, unknown> | null) => string;
}

/**
 * Thin JSON-mode client over the configured generation provider. Every
 * call runs through the retry state machine and ends in a tagged result;
 * nothing here throws for an unreachable or misbehaving provider.
 */
@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();
  private readonly retryPolicy: RetryPolicy = {
    maxRetries: RETRY_MAX_RETRIES,
    baseDelayMs: RETRY_BASE_DELAY_MS,
    maxDelayMs: RETRY_MAX_DELAY_MS,
    jitterRatio: RETRY_JITTER_RATIO,
  };

  protected sleep(ms: number): Promise<void> {
    return sleep(ms);
  }

  modelId(): string {
    if (AI_PROVIDER === 'openai') {
      return `openai/${process.env.OPENAI_MODEL ?? 'gpt-4o-mini'}`;
    }
    if (AI_PROVIDER === 'gemini') {
      return `gemini/${process.env.GEMINI_MODEL ?? 'gemini-2.0-flash'}`;
    }
    return `anthropic/${process.env.ANTHROPIC_MODEL ?? ANTHROPIC_DEFAULT_MODEL}`;
  }

  /**
   * `validate` maps the parsed object onto the expected shape; returning
   * null counts as a parse failure and is retried like one.
   */
  async generateStructured<T>(
    systemPrompt: string,
    userPrompt: string,
    label: string,
    validate: (value: Record<string, unknown>) => T | null,
  ): Promise<LlmResult<T>> {
    const request = this.buildRequest(systemPrompt, userPrompt);
    if (!request) {
      return {
        kind: 'transport_failure',
        status: 0,
        error: 'api key not configured',
        attempts: 0,
      };
    }

    const run = await runWithRetry(
      () => this.attempt(request, validate),
      (result) => {
        switch (result.kind) {
          case 'ok':
            return { ok: true };
          case 'parse_failure':
            return { ok: false, retryable: true, reason: 'unparsable output' };
          case 'transport_failure':
            return {
              ok: false,
              retryable: result.retryable,
              reason: `status=${result.status}`,
            };
        }
      },
      {
        policy: this.retryPolicy,
        sleep: (ms) => this.sleep(ms),
        onWait: (state) =>
          this.logger.warn(
            `${label} retry: attempt=${state.attempt} ${state.reason} waitMs=${state.delayMs}`,
          ),
      },
    );

    const result = run.value;
    switch (result.kind) {
      case 'ok':
        return {
          kind: 'ok',
          value: result.value,
          model: this.modelId(),
          attempts: run.attempts,
        };
      case 'parse_failure':
        this.logger.warn(
          `${label} failed: unparsable output attempts=${run.attempts}`,
        );
        return {
          kind: 'parse_failure',
          raw: result.raw,
          attempts: run.attempts,
        };
      case 'transport_failure':
        this.logUnavailable(
          `${AI_PROVIDER}_status_${result.status}`,
          result.error,
        );
        return {
          kind: 'transport_failure',
          status: result.status,
          error: result.error,
          attempts: run.attempts,
        };
    }
  }

  /**
   * Strict parse first, then the first balanced `{...}` block, then the
   * same block without trailing commas.
   */
  parseJsonObject(text: string): Record<string, unknown> | null {
    if (!text) {
      return null;
    }
    const trimmed = text
      .trim()
      .replace(/```json/gi, '')
      .replace(/```/g, '')
      .trim();

    const direct = this.tryJsonParse(trimmed);
    if (direct) {
      return direct;
    }

    const block = this.extractJsonBlock(trimmed);
    if (!block) {
      return null;
    }

    return (
      this.tryJsonParse(block) ??
      this.tryJsonParse(this.stripTrailingCommas(block))
    );
  }

  private buildRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest | null {
    if (AI_PROVIDER === 'openai') {
      return this.openaiRequest(systemPrompt, userPrompt);
    }
    if (AI_PROVIDER === 'gemini') {
      return this.geminiRequest(systemPrompt, userPrompt);
    }
    return this.anthropicRequest(systemPrompt, userPrompt);
  }

  private anthropicRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest | null {
    const apiKey = (process.env.ANTHROPIC_API_KEY ?? '').trim();
    if (!apiKey) {
      this.logUnavailable('ANTHROPIC_API_KEY not set');
      return null;
    }
    const base =
      process.env.ANTHROPIC_API_BASE ?? 'https://api.anthropic.com/v1';
    return {
      url: `${base}/messages`,
      headers: {
        'x-api-key': apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
        'Content-Type': 'application/json',
      },
      body: {
        model: process.env.ANTHROPIC_MODEL ?? ANTHROPIC_DEFAULT_MODEL,
        max_tokens: AI_MAX_OUTPUT_TOKENS,
        temperature: 0.2,
        system: systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
      },
      extractText: (json) => {
        const content = Array.isArray(json?.content) ? json.content : [];
        return content
          .map((block) => asRecord(block))
          .filter((block) => block?.type === 'text')
          .map((block) => asString(block?.text))
          .join('');
      },
    };
  }

  private openaiRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest | null {
    const apiKey = (process.env.OPENAI_API_KEY ?? '').trim();
    if (!apiKey) {
      this.logUnavailable('OPENAI_API_KEY not set');
      return null;
    }
    const base = process.env.OPENAI_API_BASE ?? 'https://api.openai.com/v1';
    return {
      url: `${base}/chat/completions`,
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: {
        model: process.env.OPENAI_MODEL ?? 'gpt-4o-mini',
        response_format: { type: 'json_object' },
        max_tokens: AI_MAX_OUTPUT_TOKENS,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0.2,
      },
      extractText: (json) => {
        const choices = Array.isArray(json?.choices) ? json.choices : [];
        const message = asRecord(asRecord(choices[0])?.message);
        return asString(message?.content);
      },
    };
  }

  private geminiRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest | null {
    const apiKey = (process.env.GEMINI_API_KEY ?? '').trim();
    if (!apiKey) {
      this.logUnavailable('GEMINI_API_KEY not set');
      return null;
    }
    const base =
      process.env.GEMINI_API_BASE ??
      'https://generativelanguage.googleapis.com/v1beta';
    const model = process.env.GEMINI_MODEL ?? 'gemini-2.0-flash';
    return {
      url: `${base}/models/${model}:generateContent`,
      headers: {
        'x-goog-api-key': apiKey,
        'Content-Type': 'application/json',
      },
      body: {
        contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
        systemInstruction: { parts: [{ text: systemPrompt }] },
        generationConfig: {
          temperature: 0.2,
          maxOutputTokens: AI_MAX_OUTPUT_TOKENS,
          responseMimeType: 'application/json',
        },
      },
      extractText: (json) => {
        const candidates = Array.isArray(json?.candidates)
          ? json.candidates
          : [];
        const content = asRecord(asRecord(candidates[0])?.content);
        const parts = Array.isArray(content?.parts) ? content.parts : [];
        return asString(asRecord(parts[0])?.text);
      },
    };
  }

  private async attempt<T>(
    request: ProviderRequest,
    validate: (value: Record<string, unknown>) => T | null,
  ): Promise<AttemptResult<T>> {
    const response = await this.safeFetchJson(request.url, {
      headers: request.headers,
      body: JSON.stringify(request.body),
      timeoutMs: AI_TIMEOUT_MS,
    });
    if (!response.ok) {
      return {
        kind: 'transport_failure',
        status: response.status,
        error: response.raw.slice(0, 180),
        retryable:
          response.status === 0 || RETRYABLE_STATUS.has(response.status),
      };
    }
    const text = request.extractText(response.json);
    const parsed = this.parseJsonObject(text);
    const value = parsed ? validate(parsed) : null;
    return value === null
      ? { kind: 'parse_failure', raw: text.slice(0, 500) }
      : { kind: 'ok', value };
  }

  private tryJsonParse(value: string): Record<string, unknown> | null {
    try {
      const parsed: unknown = JSON.parse(value);
      return asRecord(parsed);
    } catch {
      return null;
    }
  }

  private extractJsonBlock(value: string): string | null {
    const start = value.indexOf('{');
    if (start === -1) {
      return null;
    }

    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let i = start; i < value.length; i += 1) {
      const ch = value[i];
      if (inString) {
        if (escaped) {
          escaped = false;
        } else if (ch === '\\') {
          escaped = true;
        } else if (ch === '"') {
          inString = false;
        }
        continue;
      }
      if (ch === '"') {
        inString = true;
      } else if (ch === '{') {
        depth += 1;
      } else if (ch === '}') {
        depth -= 1;
        if (depth === 0) {
          return value.slice(start, i + 1);
        }
      }
    }
    return null;
  }

  private stripTrailingCommas(value: string): string {
    return value.replace(/,\s*([}\]])/g, '$1');
  }

  private async safeFetchJson(
    url: string,
    params: {
      headers: Record<string, string>;
      body: string;
      timeoutMs: number;
    },
  ): Promise<{
    ok: boolean;
    status: number;
    raw: string;
    json: Record<string, unknown> | null;
  }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: params.headers,
        body: params.body,
        signal: controller.signal,
      });
      const raw = await res.text();
      return {
        ok: res.ok,
        status: res.status,
        raw,
        json: this.tryJsonParse(raw),
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, status: 0, raw: message, json: null };
    } finally {
      clearTimeout(timeout);
    }
  }

  private logUnavailable(reason: string, detail?: string): void {
    if (this.unavailableLogged.has(reason)) {
      return;
    }
    this.unavailableLogged.add(reason);
    const detailText = cleanText(detail || '');
    if (detailText) {
      this.logger.warn(`AI unavailable: ${reason} (${detailText})`);
      return;
    }
    this.logger.warn(`AI unavailable: ${reason}`);
  }
}
