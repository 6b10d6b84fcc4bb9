import { Injectable, Logger } from '@nestjs/common';
import {
  buildChunkAnalysisPrompt,
  buildSingleReportPrompt,
} from '../prompts/analysis.prompt';
import {
  AnalysisContext,
  FilteredChunk,
  IntermediateAnalysis,
} from '../types/analysis.types';
import { LlmClientService } from './llm-client.service';

@Injectable()
export class ChunkAnalyzerService {
  private readonly logger = new Logger(ChunkAnalyzerService.name);

  constructor(private readonly llmClient: LlmClientService) {}

  async analyze(
    filteredChunk: FilteredChunk,
    context: AnalysisContext,
  ): Promise<IntermediateAnalysis | null> {
    if (filteredChunk.materials.length === 0) {
      return null;
    }

    const scope = {
      category: context.request.category,
      rawQuery: context.request.rawQuery,
      part: { index: filteredChunk.chunkIndex, total: context.chunkCount },
    };
    // A single chunk's analysis is passed through as the final report.
    const prompt =
      context.chunkCount === 1
        ? buildSingleReportPrompt(scope)
        : buildChunkAnalysisPrompt(scope);

    const startedAt = Date.now();
    const { narrative } = await this.llmClient.complete(
      prompt,
      JSON.stringify(filteredChunk.materials),
    );
    this.logger.log(
      `chunk analysis done: chunk=${filteredChunk.chunkIndex + 1}/${context.chunkCount} materials=${filteredChunk.materials.length} chars=${narrative.length} elapsedMs=${Date.now() - startedAt}`,
    );
    return { chunkIndex: filteredChunk.chunkIndex, text: narrative.trim() };
  }
}
