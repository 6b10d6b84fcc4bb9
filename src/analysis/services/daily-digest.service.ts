import { Injectable, Logger } from '@nestjs/common';
import { DIGEST_DEFAULT_QUERY } from '../config/analysis.constants';
import { Report, SubscriberDigest } from '../types/analysis.types';
import { todayIsoDate } from '../utils/date.util';
import { AnalysisPipelineService } from './analysis-pipeline.service';
import { SubscriptionStorageService } from './subscription-storage.service';

@Injectable()
export class DailyDigestService {
  private readonly logger = new Logger(DailyDigestService.name);

  constructor(
    private readonly pipeline: AnalysisPipelineService,
    private readonly subscriptionStorage: SubscriptionStorageService,
  ) {}

  async runForCategory(category: string, date?: string): Promise<Report> {
    return this.pipeline.runAnalysis(
      category,
      DIGEST_DEFAULT_QUERY,
      date || todayIsoDate(),
      { policy: 'digest' },
    );
  }

  /**
   * Builds one digest per distinct subscribed category and fans it out to
   * every enabled subscriber of that category. Categories run one at a time.
   */
  async runForSubscribers(date?: string): Promise<SubscriberDigest[]> {
    const targetDate = date || todayIsoDate();
    const subscriptions = await this.subscriptionStorage.listEnabled();

    const byCategory = new Map<string, string[]>();
    for (const subscription of subscriptions) {
      if (!subscription.category) {
        continue;
      }
      const subscribers = byCategory.get(subscription.category) ?? [];
      subscribers.push(subscription.subscriberId);
      byCategory.set(subscription.category, subscribers);
    }

    const results: SubscriberDigest[] = [];
    for (const [category, subscriberIds] of byCategory) {
      const report = await this.runForCategory(category, targetDate);
      this.logger.log(
        `digest built: category=${category} date=${targetDate} status=${report.status} subscribers=${subscriberIds.length}`,
      );
      for (const subscriberId of subscriberIds) {
        results.push({ subscriberId, category, report });
      }
    }

    return results;
  }
}
