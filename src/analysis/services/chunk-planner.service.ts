import { Injectable } from '@nestjs/common';
import { Chunk, ChunkPlan, Document } from '../types/analysis.types';
import { TokenEstimatorService, TokenMeasure } from './token-estimator.service';

export interface ChunkPlanResult extends ChunkPlan {
  usedFallback: boolean;
}

@Injectable()
export class ChunkPlannerService {
  constructor(private readonly tokenEstimator: TokenEstimatorService) {}

  /**
   * Greedy, order-preserving partition of `documents` into groups whose
   * estimated cost stays within `maxContextSize * safetyFactor`. A document
   * that alone exceeds the budget becomes a singleton overflow chunk.
   */
  plan(
    documents: readonly Document[],
    maxContextSize: number,
    safetyFactor: number,
  ): ChunkPlanResult {
    const availableBudget = Math.floor(maxContextSize * safetyFactor);
    const measures: TokenMeasure[] = documents.map((document) =>
      this.tokenEstimator.measure(document.text),
    );
    const usedFallback = measures.some((m) => m.mode === 'fallback');
    const totalCost = measures.reduce((sum, m) => sum + m.cost, 0);

    if (documents.length === 0) {
      return {
        chunks: [],
        availableBudget,
        totalCost,
        fastPath: false,
        usedFallback,
      };
    }

    if (totalCost <= availableBudget) {
      return {
        chunks: [
          {
            index: 0,
            documents: [...documents],
            cost: totalCost,
            overflow: false,
          },
        ],
        availableBudget,
        totalCost,
        fastPath: true,
        usedFallback,
      };
    }

    const chunks: Chunk[] = [];
    let current: Document[] = [];
    let currentCost = 0;
    const close = () => {
      if (current.length === 0) {
        return;
      }
      chunks.push({
        index: chunks.length,
        documents: current,
        cost: currentCost,
        overflow: current.length === 1 && currentCost > availableBudget,
      });
      current = [];
      currentCost = 0;
    };

    documents.forEach((document, i) => {
      const cost = measures[i].cost;
      if (current.length > 0 && currentCost + cost > availableBudget) {
        close();
      }
      current.push(document);
      currentCost += cost;
      if (currentCost > availableBudget) {
        close();
      }
    });
    close();

    return {
      chunks,
      availableBudget,
      totalCost,
      fastPath: false,
      usedFallback,
    };
  }
}
