import { AnalysisErrorCode, PipelineStage } from '../types/analysis.types';

export type Collaborator = 'llm' | 'embedding' | 'vector-store';

export class CollaboratorFailureError extends Error {
  constructor(
    readonly collaborator: Collaborator,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'CollaboratorFailureError';
  }
}

/** Ends a pipeline run early with one of the reportable error outcomes. */
export class PipelineAbort extends Error {
  constructor(
    readonly code: AnalysisErrorCode,
    message: string,
    readonly stage?: PipelineStage,
  ) {
    super(message);
    this.name = 'PipelineAbort';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
