import { Injectable, Logger } from '@nestjs/common';
import {
  DEFAULT_CONTEXT_SIZE,
  MODEL_CONTEXT_SIZES,
} from '../config/analysis.constants';
import { CollaboratorFailureError } from '../errors/analysis.errors';
import { cleanText } from '../utils/text.util';

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

export interface Completion {
  narrative: string;
}

interface FetchResult {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

@Injectable()
export class LlmClientService {
  private readonly logger = new Logger(LlmClientService.name);
  private readonly unavailableLogged = new Set<string>();

  /**
   * Runs one completion. `prompt` is the instruction (system role) and
   * `userContext` the material it works on (user role).
   */
  async complete(prompt: string, userContext: string): Promise<Completion> {
    const narrative =
      this.provider() === 'gemini'
        ? await this.geminiComplete(prompt, userContext)
        : await this.openaiComplete(prompt, userContext);
    return { narrative };
  }

  async embed(text: string): Promise<number[]> {
    const cleaned = cleanText(text || '');
    if (!cleaned) {
      throw new CollaboratorFailureError('embedding', 'empty text to embed');
    }
    return this.provider() === 'gemini'
      ? this.geminiEmbedding(cleaned)
      : this.openaiEmbedding(cleaned);
  }

  maxContextSize(): number {
    const override = Number(process.env.LLM_MAX_CONTEXT_TOKENS ?? '');
    if (Number.isFinite(override) && override > 0) {
      return Math.floor(override);
    }
    const model = this.completionModel();
    const exact = MODEL_CONTEXT_SIZES[model];
    if (exact) {
      return exact;
    }
    const prefix = Object.keys(MODEL_CONTEXT_SIZES)
      .filter((name) => model.startsWith(name))
      .sort((a, b) => b.length - a.length)[0];
    return prefix ? MODEL_CONTEXT_SIZES[prefix] : DEFAULT_CONTEXT_SIZE;
  }

  completionModel(): string {
    return this.provider() === 'gemini'
      ? (process.env.GEMINI_MODEL ?? 'gemini-2.0-flash')
      : (process.env.OPENAI_MODEL ?? 'gpt-4o-mini');
  }

  private provider(): 'openai' | 'gemini' {
    return (process.env.AI_PROVIDER ?? 'openai').toLowerCase() === 'gemini'
      ? 'gemini'
      : 'openai';
  }

  private temperature(): number {
    const value = Number(process.env.LLM_TEMPERATURE ?? 0.3);
    return Number.isFinite(value) ? value : 0.3;
  }

  private async geminiComplete(
    prompt: string,
    userContext: string,
  ): Promise<string> {
    const apiKey = this.requireKey('GEMINI_API_KEY', 'llm');
    const base =
      process.env.GEMINI_API_BASE ??
      'https://generativelanguage.googleapis.com/v1beta';
    const model = this.completionModel();
    const maxOutputTokens = Number(
      process.env.GEMINI_MAX_OUTPUT_TOKENS ?? 4000,
    );
    const retries = Number(process.env.GEMINI_MAX_RETRIES ?? 2);
    const backoffSec = Number(process.env.GEMINI_RETRY_BACKOFF_SEC ?? 1.5);
    const timeoutMs = Number(process.env.GEMINI_TIMEOUT_SEC ?? 60) * 1000;

    const url = `${base}/models/${model}:generateContent`;
    const payload = {
      contents: [{ role: 'user', parts: [{ text: userContext }] }],
      systemInstruction: { parts: [{ text: prompt }] },
      generationConfig: {
        temperature: this.temperature(),
        maxOutputTokens,
      },
    };

    for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
      const response = await this.safeFetchJson(url, {
        method: 'POST',
        headers: {
          'x-goog-api-key': apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        timeoutMs,
      });

      if (!response.ok) {
        if (RETRYABLE_STATUS.has(response.status) && attempt <= retries) {
          await this.sleep(backoffSec * 1000 * 2 ** (attempt - 1));
          continue;
        }
        throw this.failure('llm', 'gemini_generate_failed', response);
      }

      const text = this.extractGeminiText(response.json);
      if (text) {
        return text;
      }
      if (attempt <= retries) {
        await this.sleep(backoffSec * 1000 * 2 ** (attempt - 1));
      }
    }

    this.logUnavailable('gemini_empty_completion');
    throw new CollaboratorFailureError('llm', 'Gemini returned no text');
  }

  private async geminiEmbedding(text: string): Promise<number[]> {
    const apiKey = this.requireKey('GEMINI_API_KEY', 'embedding');
    const base =
      process.env.GEMINI_API_BASE ??
      'https://generativelanguage.googleapis.com/v1beta';
    const model = process.env.GEMINI_EMBEDDING_MODEL ?? 'gemini-embedding-001';
    const url = `${base}/models/${model}:embedContent`;

    const response = await this.safeFetchJson(url, {
      method: 'POST',
      headers: {
        'x-goog-api-key': apiKey,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: `models/${model}`,
        content: { parts: [{ text }] },
      }),
      timeoutMs: 30000,
    });

    if (!response.ok) {
      throw this.failure('embedding', 'gemini_embedding_failed', response);
    }

    const embeddingObj = this.asRecord(response.json?.embedding);
    return this.toVector(embeddingObj?.values ?? embeddingObj?.value);
  }

  private async openaiComplete(
    prompt: string,
    userContext: string,
  ): Promise<string> {
    const apiKey = this.requireKey('OPENAI_API_KEY', 'llm');
    const base = process.env.OPENAI_API_BASE ?? 'https://api.openai.com/v1';
    const retries = Number(process.env.OPENAI_MAX_RETRIES ?? 2);
    const timeoutMs = Number(process.env.OPENAI_TIMEOUT_SEC ?? 60) * 1000;

    const payload = {
      model: this.completionModel(),
      messages: [
        { role: 'system', content: prompt },
        { role: 'user', content: userContext },
      ],
      temperature: this.temperature(),
    };

    for (let attempt = 1; attempt <= retries + 1; attempt += 1) {
      const response = await this.safeFetchJson(`${base}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        timeoutMs,
      });

      if (!response.ok) {
        if (RETRYABLE_STATUS.has(response.status) && attempt <= retries) {
          await this.sleep(1200 * 2 ** (attempt - 1));
          continue;
        }
        throw this.failure('llm', 'openai_generate_failed', response);
      }

      const choicesRaw = response.json?.choices;
      const choices = Array.isArray(choicesRaw) ? choicesRaw : [];
      const first = this.asRecord(choices[0]);
      const message = this.asRecord(first?.message);
      const content =
        typeof message?.content === 'string' ? message.content : '';
      if (content.trim()) {
        return content;
      }
    }

    this.logUnavailable('openai_empty_completion');
    throw new CollaboratorFailureError('llm', 'OpenAI returned no text');
  }

  private async openaiEmbedding(text: string): Promise<number[]> {
    const apiKey = this.requireKey('OPENAI_API_KEY', 'embedding');
    const base = process.env.OPENAI_API_BASE ?? 'https://api.openai.com/v1';
    const model =
      process.env.OPENAI_EMBEDDING_MODEL ?? 'text-embedding-3-small';

    const response = await this.safeFetchJson(`${base}/embeddings`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ model, input: text }),
      timeoutMs: 30000,
    });

    if (!response.ok) {
      throw this.failure('embedding', 'openai_embedding_failed', response);
    }

    const dataRaw = response.json?.data;
    const data = Array.isArray(dataRaw) ? dataRaw : [];
    return this.toVector(this.asRecord(data[0])?.embedding);
  }

  private requireKey(
    envName: 'OPENAI_API_KEY' | 'GEMINI_API_KEY',
    collaborator: 'llm' | 'embedding',
  ): string {
    const apiKey = (process.env[envName] ?? '').trim();
    if (!apiKey) {
      this.logUnavailable(`${envName} missing`);
      throw new CollaboratorFailureError(collaborator, `${envName} is not set`);
    }
    return apiKey;
  }

  private failure(
    collaborator: 'llm' | 'embedding',
    reason: string,
    response: FetchResult,
  ): CollaboratorFailureError {
    const detail = `${response.status} ${response.raw.slice(0, 180)}`;
    this.logUnavailable(reason, detail);
    return new CollaboratorFailureError(
      collaborator,
      `${reason}: ${cleanText(detail)}`,
      response.status,
    );
  }

  private toVector(value: unknown): number[] {
    if (!Array.isArray(value)) {
      throw new CollaboratorFailureError(
        'embedding',
        'embedding response has no vector',
      );
    }
    const values = value.filter((v): v is number => typeof v === 'number');
    if (values.length === 0 || values.length !== value.length) {
      throw new CollaboratorFailureError(
        'embedding',
        'embedding response has a malformed vector',
      );
    }
    return values;
  }

  private extractGeminiText(json: unknown): string {
    const root = this.asRecord(json);
    const candidatesRaw = root?.candidates;
    const candidates = Array.isArray(candidatesRaw) ? candidatesRaw : [];
    const firstCandidate = this.asRecord(candidates[0]);
    const content = this.asRecord(firstCandidate?.content);
    const partsRaw = content?.parts;
    const parts: unknown[] = Array.isArray(partsRaw) ? partsRaw : [];
    return parts
      .map((part) => this.asRecord(part)?.text)
      .filter((text): text is string => typeof text === 'string')
      .join('')
      .trim();
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }

  private async safeFetchJson(
    url: string,
    params: {
      method: 'POST' | 'GET';
      headers: Record<string, string>;
      body?: string;
      timeoutMs: number;
    },
  ): Promise<FetchResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

    try {
      const res = await fetch(url, {
        method: params.method,
        headers: params.headers,
        body: params.body,
        signal: controller.signal,
      });
      const raw = await res.text();
      let json: Record<string, unknown> | null = null;
      try {
        json = this.asRecord(JSON.parse(raw));
      } catch {
        json = null;
      }
      return {
        ok: res.ok,
        status: res.status,
        raw,
        json,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        ok: false,
        status: 0,
        raw: message,
        json: null,
      };
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

  private async sleep(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
