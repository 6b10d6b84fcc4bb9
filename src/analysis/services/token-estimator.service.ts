import { Injectable, Logger } from '@nestjs/common';
import { getEncoding, Tiktoken, TiktokenEncoding } from 'js-tiktoken';
import {
  TOKENIZER_FALLBACK_RATIO,
  TOKENIZER_MODEL,
} from '../config/analysis.constants';
import { describeError } from '../errors/analysis.errors';
import { TokenizerMode } from '../types/analysis.types';
import { countWords } from '../utils/text.util';

export interface TokenMeasure {
  cost: number;
  mode: TokenizerMode;
}

const O200K_PREFIXES = ['gpt-4o', 'gpt-4.1', 'gpt-5', 'o1', 'o3', 'o4'];

export function encodingForModelName(model: string): TiktokenEncoding {
  const lowered = model.toLowerCase();
  return O200K_PREFIXES.some((prefix) => lowered.startsWith(prefix))
    ? 'o200k_base'
    : 'cl100k_base';
}

/**
 * Budgeting-only token counts. Falls back to words x ratio when the encoder
 * cannot be loaded or fails on an input; callers see which estimator ran
 * through `measure().mode`.
 */
@Injectable()
export class TokenEstimatorService {
  private readonly logger = new Logger(TokenEstimatorService.name);
  private readonly fallbackLogged = new Set<string>();
  private encoder: Tiktoken | null = null;
  private encoderUnavailable = false;

  estimate(text: string): number {
    return this.measure(text).cost;
  }

  measure(text: string): TokenMeasure {
    const value = text ?? '';
    const encoder = this.resolveEncoder();
    if (encoder) {
      try {
        return { cost: encoder.encode(value).length, mode: 'encoder' };
      } catch (error) {
        this.logFallback('encode_failed', describeError(error));
      }
    }
    return { cost: this.fallbackEstimate(value), mode: 'fallback' };
  }

  fallbackEstimate(text: string): number {
    return Math.ceil(countWords(text) * TOKENIZER_FALLBACK_RATIO);
  }

  private resolveEncoder(): Tiktoken | null {
    if (this.encoder) {
      return this.encoder;
    }
    if (this.encoderUnavailable) {
      return null;
    }
    try {
      this.encoder = this.loadEncoder(encodingForModelName(TOKENIZER_MODEL));
      return this.encoder;
    } catch (error) {
      this.encoderUnavailable = true;
      this.logFallback('encoder_unavailable', describeError(error));
      return null;
    }
  }

  private loadEncoder(encoding: TiktokenEncoding): Tiktoken {
    return getEncoding(encoding);
  }

  private logFallback(reason: string, detail: string): void {
    if (this.fallbackLogged.has(reason)) {
      return;
    }
    this.fallbackLogged.add(reason);
    this.logger.warn(
      `tokenizer fallback: reason=${reason} model=${TOKENIZER_MODEL} ratio=${TOKENIZER_FALLBACK_RATIO} (${detail})`,
    );
  }
}
