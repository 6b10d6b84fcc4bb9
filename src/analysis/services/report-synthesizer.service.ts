import { Injectable, Logger } from '@nestjs/common';
import { CHUNK_SEPARATOR } from '../config/analysis.constants';
import { describeError, PipelineAbort } from '../errors/analysis.errors';
import { buildSynthesisPrompt } from '../prompts/analysis.prompt';
import { AnalysisRequest, IntermediateAnalysis } from '../types/analysis.types';
import { LlmClientService } from './llm-client.service';

@Injectable()
export class ReportSynthesizerService {
  private readonly logger = new Logger(ReportSynthesizerService.name);

  constructor(private readonly llmClient: LlmClientService) {}

  async synthesize(
    analyses: readonly IntermediateAnalysis[],
    request: AnalysisRequest,
  ): Promise<string> {
    if (analyses.length === 0) {
      throw new PipelineAbort(
        'NO_MATERIALS_AFTER_FILTERING',
        'No relevant materials left after filtering',
        'synthesized',
      );
    }

    const ordered = [...analyses].sort((a, b) => a.chunkIndex - b.chunkIndex);
    if (ordered.length === 1) {
      return ordered[0].text.trim();
    }

    const prompt = buildSynthesisPrompt({
      category: request.category,
      rawQuery: request.rawQuery,
    });
    const merged = ordered
      .map((analysis) => analysis.text)
      .join(CHUNK_SEPARATOR);

    const startedAt = Date.now();
    try {
      const { narrative } = await this.llmClient.complete(prompt, merged);
      this.logger.log(
        `synthesis done: parts=${ordered.length} chars=${narrative.length} elapsedMs=${Date.now() - startedAt}`,
      );
      return narrative.trim();
    } catch (error) {
      throw new PipelineAbort(
        'SYNTHESIS_FAILURE',
        `Report synthesis failed: ${describeError(error)}`,
        'synthesized',
      );
    }
  }
}
