export interface AnalysisRequest {
  readonly category: string;
  readonly rawQuery: string;
  readonly asOfDate?: string;
}

export type RetrievalPolicyName = 'interactive' | 'digest';

export interface RetrievalPolicy {
  minScore: number;
  limit: number;
}

export interface Document {
  readonly url: string;
  readonly title: string;
  readonly text: string;
  readonly category: string;
  readonly score: number;
  readonly date?: string;
}

export interface Chunk {
  readonly index: number;
  readonly documents: readonly Document[];
  readonly cost: number;
  readonly overflow: boolean;
}

export interface ChunkPlan {
  chunks: Chunk[];
  availableBudget: number;
  totalCost: number;
  fastPath: boolean;
}

export interface FilteredMaterial {
  readonly text: string;
  readonly url: string;
}

export interface FilteredChunk {
  readonly chunkIndex: number;
  readonly materials: readonly FilteredMaterial[];
}

export interface IntermediateAnalysis {
  readonly chunkIndex: number;
  readonly text: string;
}

export type FilterParseResult =
  | { kind: 'parsed'; items: Array<{ url: string; text?: string }> }
  | { kind: 'unparseable'; reason: string };

export type PipelineStage =
  | 'idle'
  | 'theme_extracted'
  | 'retrieved'
  | 'planned'
  | 'filtering'
  | 'analyzing'
  | 'synthesized'
  | 'done'
  | 'failed';

export type AnalysisErrorCode =
  | 'INVALID_REQUEST'
  | 'NO_MATERIALS_FOUND'
  | 'NO_MATERIALS_AFTER_FILTERING'
  | 'COLLABORATOR_FAILURE'
  | 'SYNTHESIS_FAILURE';

export type TokenizerMode = 'encoder' | 'fallback';

export interface Report {
  status: 'success' | 'error';
  category: string;
  theme: string;
  materialsCount: number;
  relevantCount: number;
  chunkCount: number;
  narrative: string;
  errorCode?: AnalysisErrorCode;
  errorMessage?: string;
  asOfDate?: string;
  tokenizer: TokenizerMode;
  stages: PipelineStage[];
  generatedAt: string;
}

export interface AnalysisContext {
  readonly request: AnalysisRequest;
  readonly chunkCount: number;
}

export interface Subscription {
  subscriberId: string;
  enabled: boolean;
  category: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface SubscriberDigest {
  subscriberId: string;
  category: string;
  report: Report;
}
