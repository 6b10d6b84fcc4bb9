import { Module } from '@nestjs/common';
import { AnalysisController } from './analysis.controller';
import { AnalysisPipelineService } from './services/analysis-pipeline.service';
import { ChunkAnalyzerService } from './services/chunk-analyzer.service';
import { ChunkPlannerService } from './services/chunk-planner.service';
import { DailyDigestService } from './services/daily-digest.service';
import { LlmClientService } from './services/llm-client.service';
import { MaterialRetrieverService } from './services/material-retriever.service';
import { RelevanceFilterService } from './services/relevance-filter.service';
import { ReportSynthesizerService } from './services/report-synthesizer.service';
import { SubscriptionStorageService } from './services/subscription-storage.service';
import { TokenEstimatorService } from './services/token-estimator.service';
import { VectorStoreService } from './services/vector-store.service';

@Module({
  controllers: [AnalysisController],
  providers: [
    AnalysisPipelineService,
    ChunkAnalyzerService,
    ChunkPlannerService,
    DailyDigestService,
    LlmClientService,
    MaterialRetrieverService,
    RelevanceFilterService,
    ReportSynthesizerService,
    SubscriptionStorageService,
    TokenEstimatorService,
    VectorStoreService,
  ],
  exports: [AnalysisPipelineService, DailyDigestService],
})
export class AnalysisModule {}
