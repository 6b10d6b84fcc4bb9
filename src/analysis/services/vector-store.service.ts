import { Injectable, Logger } from '@nestjs/common';
import { CollaboratorFailureError } from '../errors/analysis.errors';
import { Document } from '../types/analysis.types';
import { cleanText } from '../utils/text.util';

const SCROLL_PAGE_SIZE = 256;

interface QdrantResponse {
  ok: boolean;
  status: number;
  raw: string;
  json: Record<string, unknown> | null;
}

/** REST client for the Qdrant collection that holds embedded materials. */
@Injectable()
export class VectorStoreService {
  private readonly logger = new Logger(VectorStoreService.name);

  async search(
    vector: number[],
    category: string,
    minScore: number,
    limit: number,
    asOfDate?: string,
  ): Promise<Document[]> {
    const must: Array<Record<string, unknown>> = [
      { key: 'category', match: { value: category } },
    ];
    if (asOfDate) {
      must.push({ key: 'date', match: { value: asOfDate } });
    }

    const response = await this.request(
      `/collections/${this.collection()}/points/search`,
      {
        vector,
        filter: { must },
        limit,
        score_threshold: minScore,
        with_payload: true,
        with_vector: false,
      },
    );

    const resultRaw = response.json?.result;
    if (!Array.isArray(resultRaw)) {
      throw new CollaboratorFailureError(
        'vector-store',
        'search response has no result list',
      );
    }

    const documents: Document[] = [];
    for (const point of resultRaw) {
      const document = this.toDocument(point, category);
      if (document) {
        documents.push(document);
      }
    }
    this.logger.log(
      `search done: category=${category} date=${asOfDate ?? '-'} minScore=${minScore} limit=${limit} hits=${resultRaw.length} documents=${documents.length}`,
    );
    return documents;
  }

  async listCategories(): Promise<string[]> {
    const categories = new Set<string>();
    let offset: unknown = null;

    do {
      const response = await this.request(
        `/collections/${this.collection()}/points/scroll`,
        {
          limit: SCROLL_PAGE_SIZE,
          offset,
          with_payload: ['category'],
          with_vector: false,
        },
      );
      const result = this.asRecord(response.json?.result);
      const pointsRaw = result?.points;
      const points: unknown[] = Array.isArray(pointsRaw) ? pointsRaw : [];
      for (const point of points) {
        const category = this.asString(
          this.asRecord(this.asRecord(point)?.payload)?.category,
        );
        if (category) {
          categories.add(category);
        }
      }
      offset = result?.next_page_offset ?? null;
    } while (offset !== null);

    return [...categories].sort((a, b) => a.localeCompare(b));
  }

  private toDocument(point: unknown, category: string): Document | null {
    const record = this.asRecord(point);
    const payload = this.asRecord(record?.payload);
    if (!record || !payload) {
      return null;
    }
    const score = typeof record.score === 'number' ? record.score : 0;
    const text =
      this.asString(payload.text) ||
      this.asString(payload.content) ||
      this.asString(payload.description);
    const date = this.asString(payload.date);

    return {
      url: this.asString(payload.url),
      title: this.asString(payload.title),
      text: cleanText(text),
      category: this.asString(payload.category) || category,
      score,
      ...(date ? { date } : {}),
    };
  }

  private collection(): string {
    return encodeURIComponent(process.env.QDRANT_COLLECTION ?? 'materials');
  }

  private async request(
    pathname: string,
    body: Record<string, unknown>,
  ): Promise<QdrantResponse> {
    const base = (process.env.QDRANT_URL ?? 'http://localhost:6333').replace(
      /\/+$/,
      '',
    );
    const apiKey = (process.env.QDRANT_API_KEY ?? '').trim();
    const timeoutMs = Number(process.env.QDRANT_TIMEOUT_SEC ?? 30) * 1000;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (apiKey) {
      headers['api-key'] = apiKey;
    }

    const response = await this.safeFetchJson(`${base}${pathname}`, {
      headers,
      body: JSON.stringify(body),
      timeoutMs,
    });

    if (!response.ok) {
      const detail = cleanText(
        `${response.status} ${response.raw.slice(0, 180)}`,
      );
      this.logger.warn(`vector store request failed: ${pathname} (${detail})`);
      throw new CollaboratorFailureError(
        'vector-store',
        `vector store request failed: ${detail}`,
        response.status,
      );
    }
    return response;
  }

  private async safeFetchJson(
    url: string,
    params: { headers: Record<string, string>; body: string; timeoutMs: number },
  ): Promise<QdrantResponse> {
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
      let json: Record<string, unknown> | null = null;
      try {
        json = this.asRecord(JSON.parse(raw));
      } catch {
        json = null;
      }
      return { ok: res.ok, status: res.status, raw, json };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, status: 0, raw: message, json: null };
    } finally {
      clearTimeout(timeout);
    }
  }

  private asString(value: unknown): string {
    if (typeof value === 'string') {
      return value.trim();
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    return '';
  }

  private asRecord(value: unknown): Record<string, unknown> | null {
    if (!value || typeof value !== 'object' || Array.isArray(value)) {
      return null;
    }
    return value as Record<string, unknown>;
  }
}
