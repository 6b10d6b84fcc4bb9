import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { buildFilterPrompt } from '../prompts/analysis.prompt';
import { describeError } from '../errors/analysis.errors';
import {
  AnalysisContext,
  Chunk,
  FilteredChunk,
  FilteredMaterial,
  FilterParseResult,
} from '../types/analysis.types';
import { stripCodeFences, stripTrailingCommas } from '../utils/text.util';
import { LlmClientService } from './llm-client.service';

const filterResponseSchema = z.array(
  z.object({
    url: z.string().trim().min(1),
    text: z.string().optional(),
  }),
);

export function parseFilterResponse(raw: string): FilterParseResult {
  const cleaned = stripCodeFences(raw);
  if (!cleaned) {
    return { kind: 'unparseable', reason: 'empty response' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    try {
      parsed = JSON.parse(stripTrailingCommas(cleaned));
    } catch (error) {
      return { kind: 'unparseable', reason: describeError(error) };
    }
  }

  const result = filterResponseSchema.safeParse(parsed);
  if (!result.success) {
    return {
      kind: 'unparseable',
      reason: Array.isArray(parsed) ? 'unexpected item shape' : 'not a list',
    };
  }
  return { kind: 'parsed', items: result.data };
}

@Injectable()
export class RelevanceFilterService {
  private readonly logger = new Logger(RelevanceFilterService.name);

  constructor(private readonly llmClient: LlmClientService) {}

  /**
   * Keeps the chunk documents the model judges on-topic. Model failures and
   * unparseable answers yield an empty result.
   */
  async filter(chunk: Chunk, context: AnalysisContext): Promise<FilteredChunk> {
    const prompt = buildFilterPrompt({
      category: context.request.category,
      rawQuery: context.request.rawQuery,
      part: { index: chunk.index, total: context.chunkCount },
    });
    const materials: FilteredMaterial[] = chunk.documents.map((document) => ({
      text: document.text,
      url: document.url,
    }));

    let raw: string;
    try {
      raw = (await this.llmClient.complete(prompt, JSON.stringify(materials)))
        .narrative;
    } catch (error) {
      this.logger.warn(
        `filter call failed: chunk=${chunk.index + 1}/${context.chunkCount} (${describeError(error)})`,
      );
      return { chunkIndex: chunk.index, materials: [] };
    }

    const parsed = parseFilterResponse(raw);
    if (parsed.kind === 'unparseable') {
      this.logger.warn(
        `filter response unparseable: chunk=${chunk.index + 1}/${context.chunkCount} reason=${parsed.reason} raw=${raw.slice(0, 200)}`,
      );
      return { chunkIndex: chunk.index, materials: [] };
    }

    const keep = new Set(parsed.items.map((item) => item.url.trim()));
    const kept = materials.filter((material) => keep.has(material.url));
    const seen = new Set<string>();
    const unique = kept.filter((material) => {
      if (seen.has(material.url)) {
        return false;
      }
      seen.add(material.url);
      return true;
    });

    this.logger.log(
      `filter done: chunk=${chunk.index + 1}/${context.chunkCount} in=${materials.length} kept=${unique.length} unknownUrls=${[...keep].filter((url) => !seen.has(url)).length}`,
    );
    return { chunkIndex: chunk.index, materials: unique };
  }
}
