import {
  BadRequestException,
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { AnalysisPipelineService } from './services/analysis-pipeline.service';
import { DailyDigestService } from './services/daily-digest.service';
import { SubscriptionStorageService } from './services/subscription-storage.service';
import { VectorStoreService } from './services/vector-store.service';
import {
  Report,
  SubscriberDigest,
  Subscription,
} from './types/analysis.types';
import { isIsoDate } from './utils/date.util';

@Controller()
export class AnalysisController {
  constructor(
    private readonly pipeline: AnalysisPipelineService,
    private readonly dailyDigest: DailyDigestService,
    private readonly subscriptionStorage: SubscriptionStorageService,
    private readonly vectorStore: VectorStoreService,
  ) {}

  @Get('health')
  getHealth(): { status: string; service: string } {
    return {
      status: 'ok',
      service: 'category-analyst',
    };
  }

  @Post('analysis')
  async analyze(
    @Body('category') categoryRaw?: unknown,
    @Body('query') queryRaw?: unknown,
    @Body('asOfDate') asOfDateRaw?: unknown,
  ): Promise<Report> {
    return this.pipeline.runAnalysis(
      this.parseRequiredText(categoryRaw, 'category'),
      this.parseRequiredText(queryRaw, 'query'),
      this.parseDate(asOfDateRaw, 'asOfDate'),
    );
  }

  @Get('categories')
  async getCategories(): Promise<{ categories: string[] }> {
    return { categories: await this.vectorStore.listCategories() };
  }

  @Get('digest')
  async getDigest(
    @Query('category') categoryRaw?: string,
    @Query('date') dateRaw?: string,
  ): Promise<Report> {
    return this.dailyDigest.runForCategory(
      this.parseRequiredText(categoryRaw, 'category'),
      this.parseDate(dateRaw, 'date'),
    );
  }

  @Post('digest/run')
  async runDigest(@Body('date') dateRaw?: unknown): Promise<{
    date: string | null;
    results: SubscriberDigest[];
  }> {
    const date = this.parseDate(dateRaw, 'date');
    const results = await this.dailyDigest.runForSubscribers(date);
    return { date: date ?? null, results };
  }

  @Get('subscriptions/:id')
  async getSubscription(@Param('id') id: string): Promise<Subscription> {
    const subscription = await this.subscriptionStorage.get(
      this.parseRequiredText(id, 'id'),
    );
    if (!subscription) {
      throw new NotFoundException(`subscription ${id} not found`);
    }
    return subscription;
  }

  @Post('subscriptions/:id')
  async registerSubscriber(@Param('id') id: string): Promise<Subscription> {
    return this.subscriptionStorage.create(this.parseRequiredText(id, 'id'));
  }

  @Put('subscriptions/:id')
  async subscribe(
    @Param('id') id: string,
    @Body('category') categoryRaw?: unknown,
  ): Promise<Subscription> {
    return this.subscriptionStorage.subscribe(
      this.parseRequiredText(id, 'id'),
      this.parseRequiredText(categoryRaw, 'category'),
    );
  }

  @Post('subscriptions/:id/toggle')
  async toggleSubscription(@Param('id') id: string): Promise<Subscription> {
    const subscription = await this.subscriptionStorage.toggle(
      this.parseRequiredText(id, 'id'),
    );
    if (!subscription) {
      throw new NotFoundException(`subscription ${id} not found`);
    }
    return subscription;
  }

  private parseRequiredText(value: unknown, fieldName: string): string {
    if (typeof value !== 'string' || !value.trim()) {
      throw new BadRequestException(`${fieldName} must be a non-empty string`);
    }
    return value.trim();
  }

  private parseDate(value: unknown, fieldName: string): string | undefined {
    if (value == null || value === '') {
      return undefined;
    }
    if (typeof value !== 'string' || !isIsoDate(value.trim())) {
      throw new BadRequestException(`${fieldName} must be a YYYY-MM-DD date`);
    }
    return value.trim();
  }
}
