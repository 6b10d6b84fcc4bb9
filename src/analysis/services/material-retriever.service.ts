import { Injectable, Logger } from '@nestjs/common';
import { Document } from '../types/analysis.types';
import { VectorStoreService } from './vector-store.service';

@Injectable()
export class MaterialRetrieverService {
  private readonly logger = new Logger(MaterialRetrieverService.name);

  constructor(private readonly vectorStore: VectorStoreService) {}

  /**
   * Candidates ordered by descending score, one per url. Ties keep the
   * order the store returned them in.
   */
  async retrieve(
    vector: number[],
    category: string,
    minScore: number,
    limit: number,
    asOfDate?: string,
  ): Promise<Document[]> {
    const hits = await this.vectorStore.search(
      vector,
      category,
      minScore,
      limit,
      asOfDate,
    );

    const byUrl = new Map<string, { document: Document; order: number }>();
    let skipped = 0;
    hits.forEach((document, order) => {
      if (!document.url || !document.text || document.score < minScore) {
        skipped += 1;
        return;
      }
      const existing = byUrl.get(document.url);
      if (!existing || document.score > existing.document.score) {
        byUrl.set(document.url, {
          document,
          order: existing?.order ?? order,
        });
      }
    });

    const ranked = [...byUrl.values()]
      .sort((a, b) => b.document.score - a.document.score || a.order - b.order)
      .map((entry) => entry.document)
      .slice(0, limit);

    this.logger.log(
      `retrieve done: category=${category} hits=${hits.length} unique=${ranked.length} skipped=${skipped}`,
    );
    return ranked;
  }
}
