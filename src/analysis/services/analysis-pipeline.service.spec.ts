import { Logger } from '@nestjs/common';
import { CollaboratorFailureError } from '../errors/analysis.errors';
import { Document, FilteredMaterial } from '../types/analysis.types';
import { AnalysisPipelineService } from './analysis-pipeline.service';
import { ChunkAnalyzerService } from './chunk-analyzer.service';
import { ChunkPlannerService } from './chunk-planner.service';
import { RelevanceFilterService } from './relevance-filter.service';
import { ReportSynthesizerService } from './report-synthesizer.service';

const docOfCost = (id: string, cost: number): Document => ({
  url: `https://example.com/${id}`,
  title: id,
  text: 'x'.repeat(cost),
  category: 'Games',
  score: 0.8,
});

const idsOf = (userContext: string): string[] =>
  (JSON.parse(userContext) as FilteredMaterial[]).map(
    (m) => m.url.split('/').pop() ?? '',
  );

type PromptKind = 'theme' | 'filter' | 'analysis' | 'synthesis';

function kindOf(prompt: string): PromptKind {
  if (prompt.includes('extract the most specific topic')) {
    return 'theme';
  }
  if (prompt.includes('Reply STRICTLY with a JSON list')) {
    return 'filter';
  }
  if (prompt.includes('Merge them into one coherent')) {
    return 'synthesis';
  }
  return 'analysis';
}

interface Harness {
  service: AnalysisPipelineService;
  complete: jest.Mock;
  embed: jest.Mock;
  retrieve: jest.Mock;
  callsOf: (kind: PromptKind) => string[];
}

function buildHarness(params: {
  documents: Document[];
  maxContextSize: number;
  filter?: (ids: string[]) => Promise<string> | string;
  analysis?: (ids: string[]) => Promise<string> | string;
  synthesis?: (userContext: string) => Promise<string> | string;
}): Harness {
  const complete = jest.fn(async (prompt: string, userContext: string) => {
    switch (kindOf(prompt)) {
      case 'theme':
        return { narrative: 'item X' };
      case 'filter': {
        const ids = idsOf(userContext);
        const narrative = params.filter
          ? await params.filter(ids)
          : userContext;
        return { narrative };
      }
      case 'analysis': {
        const ids = idsOf(userContext);
        const narrative = params.analysis
          ? await params.analysis(ids)
          : `analysis of ${ids.join(',')}`;
        return { narrative };
      }
      case 'synthesis':
        return {
          narrative: params.synthesis
            ? await params.synthesis(userContext)
            : 'final report',
        };
    }
  });
  const embed = jest.fn().mockResolvedValue([0.1, 0.2]);
  const llmClient = {
    complete,
    embed,
    maxContextSize: () => params.maxContextSize,
  };
  const retrieve = jest.fn().mockResolvedValue(params.documents);
  const estimator = {
    measure: (text: string) => ({ cost: text.length, mode: 'encoder' }),
  };

  const service = new AnalysisPipelineService(
    llmClient as never,
    { retrieve } as never,
    new ChunkPlannerService(estimator as never),
    new RelevanceFilterService(llmClient as never),
    new ChunkAnalyzerService(llmClient as never),
    new ReportSynthesizerService(llmClient as never),
  );

  return {
    service,
    complete,
    embed,
    retrieve,
    callsOf: (kind) =>
      complete.mock.calls
        .filter(([prompt]) => kindOf(prompt) === kind)
        .map(([, userContext]) => userContext),
  };
}

describe('AnalysisPipelineService', () => {
  beforeEach(() => {
    for (const level of ['log', 'warn', 'error', 'debug'] as const) {
      jest.spyOn(Logger.prototype, level).mockImplementation(() => undefined);
    }
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('answers a small query with one chunk and a pass-through synthesis', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 70), docOfCost('b', 60), docOfCost('c', 70)],
      maxContextSize: 1250,
    });

    const report = await harness.service.runAnalysis(
      'Games',
      'release impact of item X',
    );

    expect(report).toMatchObject({
      status: 'success',
      category: 'Games',
      theme: 'item X',
      materialsCount: 3,
      relevantCount: 3,
      chunkCount: 1,
      narrative: 'analysis of a,b,c',
      tokenizer: 'encoder',
    });
    expect(report.errorCode).toBeUndefined();
    expect(report.stages).toEqual([
      'idle',
      'theme_extracted',
      'retrieved',
      'planned',
      'filtering',
      'analyzing',
      'synthesized',
      'done',
    ]);
    expect(harness.callsOf('filter')).toHaveLength(1);
    expect(harness.callsOf('analysis')).toHaveLength(1);
    expect(harness.callsOf('synthesis')).toHaveLength(0);
    expect(harness.embed).toHaveBeenCalledWith('item X');
    expect(harness.retrieve).toHaveBeenCalledWith(
      [0.1, 0.2],
      'Games',
      0.3,
      1000,
      undefined,
    );
  });

  it('keeps the extracted theme out of filter and analysis prompts', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 10)],
      maxContextSize: 1000,
    });

    await harness.service.runAnalysis('Games', 'anything new this week?');

    const downstreamPrompts = harness.complete.mock.calls
      .map(([prompt]) => String(prompt))
      .filter((prompt) => kindOf(prompt) !== 'theme');
    expect(downstreamPrompts).toHaveLength(2);
    for (const prompt of downstreamPrompts) {
      expect(prompt).toContain('anything new this week?');
      expect(prompt).not.toContain('item X');
    }
  });

  it('reports no materials without any downstream model call', async () => {
    const harness = buildHarness({ documents: [], maxContextSize: 1000 });

    const report = await harness.service.runAnalysis('Games', 'anything new?');

    expect(report).toMatchObject({
      status: 'error',
      errorCode: 'NO_MATERIALS_FOUND',
      errorMessage: 'No relevant materials found',
      materialsCount: 0,
      narrative: '',
    });
    expect(report.stages).toEqual([
      'idle',
      'theme_extracted',
      'retrieved',
      'failed',
    ]);
    expect(harness.complete).toHaveBeenCalledTimes(1);
    expect(harness.callsOf('theme')).toHaveLength(1);
  });

  it('skips a chunk whose filter keeps nothing and merges the rest in order', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 60), docOfCost('b', 60), docOfCost('c', 60)],
      maxContextSize: 100,
      filter: (ids) =>
        ids.includes('b')
          ? '[]'
          : JSON.stringify(
              ids.map((id) => ({ url: `https://example.com/${id}` })),
            ),
    });

    const report = await harness.service.runAnalysis(
      'Games',
      'release impact of item X',
    );

    expect(report).toMatchObject({
      status: 'success',
      chunkCount: 3,
      materialsCount: 3,
      relevantCount: 2,
      narrative: 'final report',
    });
    expect(harness.callsOf('filter')).toHaveLength(3);
    expect(harness.callsOf('analysis')).toHaveLength(2);
    expect(harness.callsOf('synthesis')).toEqual([
      'analysis of a\n\n---\n\nanalysis of c',
    ]);
  });

  it('distinguishes an all-filtered run from an empty retrieval', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 60), docOfCost('b', 60)],
      maxContextSize: 100,
      filter: () => 'Sorry, none of these are relevant.',
    });

    const report = await harness.service.runAnalysis('Games', 'item X');

    expect(report).toMatchObject({
      status: 'error',
      errorCode: 'NO_MATERIALS_AFTER_FILTERING',
      errorMessage: 'No relevant materials left after filtering',
      materialsCount: 2,
      relevantCount: 0,
    });
    expect(harness.callsOf('analysis')).toHaveLength(0);
    expect(harness.callsOf('synthesis')).toHaveLength(0);
  });

  it('aborts on embedding failure before retrieval', async () => {
    const harness = buildHarness({ documents: [], maxContextSize: 1000 });
    harness.embed.mockRejectedValue(
      new CollaboratorFailureError('embedding', 'OPENAI_API_KEY is not set'),
    );

    const report = await harness.service.runAnalysis('Games', 'item X');

    expect(report).toMatchObject({
      status: 'error',
      errorCode: 'COLLABORATOR_FAILURE',
      errorMessage: 'OPENAI_API_KEY is not set',
      theme: 'item X',
    });
    expect(harness.retrieve).not.toHaveBeenCalled();
  });

  it('aborts when a chunk analysis fails', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 10)],
      maxContextSize: 1000,
      analysis: () => {
        throw new Error('upstream 502');
      },
    });

    const report = await harness.service.runAnalysis('Games', 'item X');

    expect(report).toMatchObject({
      status: 'error',
      errorCode: 'COLLABORATOR_FAILURE',
      errorMessage: 'upstream 502',
    });
  });

  it('stops queued chunks once a chunk analysis fails', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 60), docOfCost('b', 60), docOfCost('c', 60)],
      maxContextSize: 100,
      analysis: () => {
        throw new Error('upstream 502');
      },
    });

    const report = await harness.service.runAnalysis('Games', 'item X');
    const filterCallsAtReturn = harness.callsOf('filter').length;
    const analysisCallsAtReturn = harness.callsOf('analysis').length;
    await new Promise((resolve) => {
      setTimeout(resolve, 20);
    });

    expect(report).toMatchObject({
      status: 'error',
      errorCode: 'COLLABORATOR_FAILURE',
      chunkCount: 3,
    });
    expect(report.stages).toEqual([
      'idle',
      'theme_extracted',
      'retrieved',
      'planned',
      'filtering',
      'analyzing',
      'failed',
    ]);
    expect(filterCallsAtReturn).toBe(1);
    expect(analysisCallsAtReturn).toBe(1);
    expect(harness.callsOf('filter')).toHaveLength(1);
    expect(harness.callsOf('analysis')).toHaveLength(1);
  });

  it('reports a failed merge as a synthesis failure', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 60), docOfCost('b', 60)],
      maxContextSize: 100,
      synthesis: () => {
        throw new Error('context length exceeded');
      },
    });

    const report = await harness.service.runAnalysis('Games', 'item X');

    expect(report).toMatchObject({
      status: 'error',
      errorCode: 'SYNTHESIS_FAILURE',
      errorMessage: 'Report synthesis failed: context length exceeded',
    });
  });

  it('rejects malformed dates without calling collaborators', async () => {
    const harness = buildHarness({ documents: [], maxContextSize: 1000 });

    const report = await harness.service.runAnalysis(
      'Games',
      'item X',
      '20.03.2024',
    );

    expect(report).toMatchObject({
      status: 'error',
      errorCode: 'INVALID_REQUEST',
      errorMessage: 'asOfDate must be a YYYY-MM-DD date',
    });
    expect(harness.complete).not.toHaveBeenCalled();
  });

  it('uses the digest retrieval policy with the requested date', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 10)],
      maxContextSize: 1000,
    });

    const report = await harness.service.runAnalysis(
      'Games',
      'daily news',
      '2024-03-20',
      { policy: 'digest' },
    );

    expect(report.asOfDate).toBe('2024-03-20');
    expect(harness.retrieve).toHaveBeenCalledWith(
      [0.1, 0.2],
      'Games',
      0.3,
      10000,
      '2024-03-20',
    );
  });

  it('keeps chunk order when chunks finish out of order', async () => {
    const delays: Record<string, number> = { a: 30, b: 15, c: 0 };
    const harness = buildHarness({
      documents: [docOfCost('a', 60), docOfCost('b', 60), docOfCost('c', 60)],
      maxContextSize: 100,
      analysis: async (ids) => {
        await new Promise((resolve) => {
          setTimeout(resolve, delays[ids[0]]);
        });
        return `analysis of ${ids[0]}`;
      },
    });

    const report = await harness.service.runAnalysis(
      'Games',
      'item X',
      undefined,
      { concurrency: 3 },
    );

    expect(report.status).toBe('success');
    expect(harness.callsOf('synthesis')).toEqual([
      'analysis of a\n\n---\n\nanalysis of b\n\n---\n\nanalysis of c',
    ]);
  });

  it('shares one run between identical concurrent requests', async () => {
    const harness = buildHarness({
      documents: [docOfCost('a', 10)],
      maxContextSize: 1000,
    });

    const [first, second] = await Promise.all([
      harness.service.runAnalysis('Games', 'item X'),
      harness.service.runAnalysis('Games', 'item X'),
    ]);

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    expect(harness.callsOf('theme')).toHaveLength(1);

    first.stages.push('failed');
    expect(second.stages[second.stages.length - 1]).toBe('done');
  });
});
