import { Injectable, Logger } from '@nestjs/common';
import pLimit from 'p-limit';
import {
  ANALYSIS_CHUNK_CONCURRENCY,
  CONTEXT_SAFETY_FACTOR,
  RETRIEVAL_POLICY,
} from '../config/analysis.constants';
import {
  CollaboratorFailureError,
  describeError,
  PipelineAbort,
} from '../errors/analysis.errors';
import { buildThemePrompt } from '../prompts/analysis.prompt';
import {
  AnalysisContext,
  AnalysisRequest,
  Chunk,
  IntermediateAnalysis,
  PipelineStage,
  Report,
  RetrievalPolicyName,
  TokenizerMode,
} from '../types/analysis.types';
import { isIsoDate } from '../utils/date.util';
import { normalizeTheme } from '../utils/text.util';
import { ChunkAnalyzerService } from './chunk-analyzer.service';
import { ChunkPlannerService } from './chunk-planner.service';
import { LlmClientService } from './llm-client.service';
import { MaterialRetrieverService } from './material-retriever.service';
import { RelevanceFilterService } from './relevance-filter.service';
import { ReportSynthesizerService } from './report-synthesizer.service';

export interface RunAnalysisOptions {
  policy?: RetrievalPolicyName;
  concurrency?: number;
}

interface ChunkOutcome {
  relevant: number;
  analysis: IntermediateAnalysis | null;
}

/** Per-request state; never shared between runs. */
class PipelineRun {
  readonly stages: PipelineStage[] = ['idle'];
  theme = '';
  materialsCount = 0;
  relevantCount = 0;
  chunkCount = 0;
  tokenizer: TokenizerMode = 'encoder';
  // Set once a chunk fails; queued chunks then return without calling out.
  aborted = false;

  constructor(readonly request: AnalysisRequest) {}

  get stage(): PipelineStage {
    return this.stages[this.stages.length - 1];
  }
}

@Injectable()
export class AnalysisPipelineService {
  private readonly logger = new Logger(AnalysisPipelineService.name);
  private readonly inFlightRuns = new Map<string, Promise<Report>>();

  constructor(
    private readonly llmClient: LlmClientService,
    private readonly retriever: MaterialRetrieverService,
    private readonly chunkPlanner: ChunkPlannerService,
    private readonly relevanceFilter: RelevanceFilterService,
    private readonly chunkAnalyzer: ChunkAnalyzerService,
    private readonly reportSynthesizer: ReportSynthesizerService,
  ) {}

  /**
   * Entry point for interactive queries and scheduled digests. Always
   * resolves with a Report; failures are reported through `status`.
   */
  async runAnalysis(
    category: string,
    rawQuery: string,
    asOfDate?: string,
    options?: RunAnalysisOptions,
  ): Promise<Report> {
    const policy = options?.policy ?? 'interactive';
    const request: AnalysisRequest = Object.freeze({
      category: (category ?? '').trim(),
      rawQuery: (rawQuery ?? '').trim(),
      ...(asOfDate ? { asOfDate: asOfDate.trim() } : {}),
    });
    const lockKey = JSON.stringify([
      policy,
      request.category,
      request.rawQuery,
      request.asOfDate ?? '',
    ]);

    const inFlight = this.inFlightRuns.get(lockKey);
    if (inFlight) {
      // Joined callers get their own copy of the shared run's report.
      const report = await inFlight;
      return { ...report, stages: [...report.stages] };
    }

    const task = this.execute(request, policy, options?.concurrency);
    this.inFlightRuns.set(lockKey, task);
    try {
      return await task;
    } finally {
      if (this.inFlightRuns.get(lockKey) === task) {
        this.inFlightRuns.delete(lockKey);
      }
    }
  }

  private async execute(
    request: AnalysisRequest,
    policyName: RetrievalPolicyName,
    concurrency?: number,
  ): Promise<Report> {
    const run = new PipelineRun(request);
    const startedAt = Date.now();
    this.logger.log(
      `analysis start: category=${request.category} policy=${policyName} date=${request.asOfDate ?? '-'}`,
    );

    try {
      this.validate(request);

      run.theme = await this.extractTheme(request);
      this.advance(run, 'theme_extracted');

      const vector = await this.llmClient.embed(run.theme);
      const policy = RETRIEVAL_POLICY[policyName];
      const documents = await this.retriever.retrieve(
        vector,
        request.category,
        policy.minScore,
        policy.limit,
        request.asOfDate,
      );
      run.materialsCount = documents.length;
      this.advance(run, 'retrieved');
      if (documents.length === 0) {
        throw new PipelineAbort(
          'NO_MATERIALS_FOUND',
          'No relevant materials found',
          'retrieved',
        );
      }

      const plan = this.chunkPlanner.plan(
        documents,
        this.llmClient.maxContextSize(),
        CONTEXT_SAFETY_FACTOR,
      );
      run.chunkCount = plan.chunks.length;
      run.tokenizer = plan.usedFallback ? 'fallback' : 'encoder';
      this.advance(run, 'planned');
      this.logger.log(
        `plan done: documents=${documents.length} totalCost=${plan.totalCost} budget=${plan.availableBudget} chunks=${plan.chunks.length} fastPath=${plan.fastPath ? 1 : 0} tokenizer=${run.tokenizer}`,
      );

      const context: AnalysisContext = {
        request,
        chunkCount: plan.chunks.length,
      };
      const limit = pLimit(
        Math.max(1, Math.floor(concurrency ?? ANALYSIS_CHUNK_CONCURRENCY)),
      );
      let outcomes: ChunkOutcome[];
      try {
        outcomes = await Promise.all(
          plan.chunks.map((chunk) =>
            limit(() => this.processChunk(run, chunk, context)),
          ),
        );
      } catch (error) {
        run.aborted = true;
        throw error;
      }

      run.relevantCount = outcomes.reduce((sum, o) => sum + o.relevant, 0);
      const analyses = outcomes
        .map((outcome) => outcome.analysis)
        .filter((a): a is IntermediateAnalysis => a !== null);
      if (analyses.length === 0) {
        throw new PipelineAbort(
          'NO_MATERIALS_AFTER_FILTERING',
          'No relevant materials left after filtering',
          run.stage,
        );
      }

      const narrative = await this.reportSynthesizer.synthesize(
        analyses,
        request,
      );
      this.advance(run, 'synthesized');
      this.advance(run, 'done');
      this.logger.log(
        `analysis done: category=${request.category} materials=${run.materialsCount} relevant=${run.relevantCount} chunks=${run.chunkCount} analyses=${analyses.length} elapsedMs=${Date.now() - startedAt}`,
      );

      return this.buildReport(run, { status: 'success', narrative });
    } catch (error) {
      return this.fail(run, error, startedAt);
    }
  }

  private validate(request: AnalysisRequest): void {
    if (!request.category) {
      throw new PipelineAbort('INVALID_REQUEST', 'category is required');
    }
    if (!request.rawQuery) {
      throw new PipelineAbort('INVALID_REQUEST', 'query is required');
    }
    if (request.asOfDate && !isIsoDate(request.asOfDate)) {
      throw new PipelineAbort(
        'INVALID_REQUEST',
        'asOfDate must be a YYYY-MM-DD date',
      );
    }
  }

  private async extractTheme(request: AnalysisRequest): Promise<string> {
    const { narrative } = await this.llmClient.complete(
      buildThemePrompt(request.category, request.rawQuery),
      request.rawQuery,
    );
    const theme = normalizeTheme(narrative);
    if (!theme) {
      throw new CollaboratorFailureError(
        'llm',
        'theme extraction returned no text',
      );
    }
    this.logger.log(`theme extracted: ${theme}`);
    return theme;
  }

  private async processChunk(
    run: PipelineRun,
    chunk: Chunk,
    context: AnalysisContext,
  ): Promise<ChunkOutcome> {
    if (run.aborted) {
      return { relevant: 0, analysis: null };
    }
    this.advance(run, 'filtering');
    const filtered = await this.relevanceFilter.filter(chunk, context);
    if (filtered.materials.length === 0) {
      this.logger.warn(
        `chunk skipped: chunk=${chunk.index + 1}/${context.chunkCount} no relevant materials`,
      );
      return { relevant: 0, analysis: null };
    }

    if (run.aborted) {
      return { relevant: 0, analysis: null };
    }
    this.advance(run, 'analyzing');
    try {
      const analysis = await this.chunkAnalyzer.analyze(filtered, context);
      return { relevant: filtered.materials.length, analysis };
    } catch (error) {
      run.aborted = true;
      throw error;
    }
  }

  private advance(run: PipelineRun, stage: PipelineStage): void {
    run.stages.push(stage);
    this.logger.debug(`stage ${stage}: category=${run.request.category}`);
  }

  private fail(run: PipelineRun, error: unknown, startedAt: number): Report {
    const failedAt = run.stage;
    run.stages.push('failed');

    if (error instanceof PipelineAbort) {
      this.logger.warn(
        `analysis ended: code=${error.code} stage=${error.stage ?? failedAt} message=${error.message} elapsedMs=${Date.now() - startedAt}`,
      );
      return this.buildReport(run, {
        status: 'error',
        errorCode: error.code,
        errorMessage: error.message,
      });
    }

    const collaborator =
      error instanceof CollaboratorFailureError
        ? error.collaborator
        : 'internal';
    this.logger.error(
      `analysis failed: stage=${failedAt} collaborator=${collaborator} message=${describeError(error)} elapsedMs=${Date.now() - startedAt}`,
    );
    return this.buildReport(run, {
      status: 'error',
      errorCode: 'COLLABORATOR_FAILURE',
      errorMessage: describeError(error),
    });
  }

  private buildReport(
    run: PipelineRun,
    outcome: Pick<Report, 'status'> &
      Partial<Pick<Report, 'narrative' | 'errorCode' | 'errorMessage'>>,
  ): Report {
    return {
      status: outcome.status,
      category: run.request.category,
      theme: run.theme,
      materialsCount: run.materialsCount,
      relevantCount: run.relevantCount,
      chunkCount: run.chunkCount,
      narrative: outcome.narrative ?? '',
      ...(outcome.errorCode ? { errorCode: outcome.errorCode } : {}),
      ...(outcome.errorMessage ? { errorMessage: outcome.errorMessage } : {}),
      ...(run.request.asOfDate ? { asOfDate: run.request.asOfDate } : {}),
      tokenizer: run.tokenizer,
      stages: [...run.stages],
      generatedAt: new Date().toISOString(),
    };
  }
}
