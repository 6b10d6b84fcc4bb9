import { Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { SUBSCRIPTIONS_JSON } from '../config/analysis.constants';
import { Subscription } from '../types/analysis.types';

interface SubscriptionFile {
  bySubscriber: Record<string, Subscription>;
}

@Injectable()
export class SubscriptionStorageService {
  private readonly logger = new Logger(SubscriptionStorageService.name);
  // Serializes read-modify-write cycles on the subscription file.
  private writeQueue: Promise<unknown> = Promise.resolve();

  async get(subscriberId: string): Promise<Subscription | null> {
    const file = await this.load();
    return file.bySubscriber[subscriberId] ?? null;
  }

  /** Creates a disabled subscription without a category; keeps an existing one. */
  async create(subscriberId: string): Promise<Subscription> {
    return this.mutate((file) => {
      const existing = file.bySubscriber[subscriberId];
      if (existing) {
        return existing;
      }
      const now = new Date().toISOString();
      const created: Subscription = {
        subscriberId,
        enabled: false,
        category: null,
        createdAt: now,
        updatedAt: now,
      };
      file.bySubscriber[subscriberId] = created;
      this.logger.log(`subscription created: subscriber=${subscriberId}`);
      return created;
    });
  }

  async subscribe(
    subscriberId: string,
    category: string,
  ): Promise<Subscription> {
    return this.mutate((file) => {
      const now = new Date().toISOString();
      const existing = file.bySubscriber[subscriberId];
      const updated: Subscription = {
        subscriberId,
        enabled: true,
        category,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      };
      file.bySubscriber[subscriberId] = updated;
      this.logger.log(
        `subscription enabled: subscriber=${subscriberId} category=${category}`,
      );
      return updated;
    });
  }

  async toggle(subscriberId: string): Promise<Subscription | null> {
    return this.mutate((file) => {
      const existing = file.bySubscriber[subscriberId];
      if (!existing) {
        return null;
      }
      const updated: Subscription = {
        ...existing,
        enabled: !existing.enabled,
        updatedAt: new Date().toISOString(),
      };
      file.bySubscriber[subscriberId] = updated;
      return updated;
    });
  }

  async listEnabled(): Promise<Subscription[]> {
    const file = await this.load();
    return Object.values(file.bySubscriber)
      .filter((subscription) => subscription.enabled)
      .sort((a, b) => a.subscriberId.localeCompare(b.subscriberId));
  }

  private async mutate<T>(change: (file: SubscriptionFile) => T): Promise<T> {
    const task = this.writeQueue.then(async () => {
      const file = await this.load();
      const result = change(file);
      await this.safeWriteJson(SUBSCRIPTIONS_JSON, file);
      return result;
    });
    this.writeQueue = task.catch(() => undefined);
    return task;
  }

  private async load(): Promise<SubscriptionFile> {
    const parsed = await this.safeReadJson(SUBSCRIPTIONS_JSON);
    const bySubscriber =
      parsed && typeof parsed === 'object' && 'bySubscriber' in parsed
        ? parsed.bySubscriber
        : null;
    if (!bySubscriber || typeof bySubscriber !== 'object') {
      return { bySubscriber: {} };
    }
    const out: Record<string, Subscription> = {};
    for (const [id, value] of Object.entries(bySubscriber)) {
      const subscription = this.toSubscription(id, value);
      if (subscription) {
        out[id] = subscription;
      }
    }
    return { bySubscriber: out };
  }

  private toSubscription(id: string, value: unknown): Subscription | null {
    if (!value || typeof value !== 'object') {
      return null;
    }
    const record = value as Record<string, unknown>;
    const now = new Date().toISOString();
    return {
      subscriberId: id,
      enabled: record.enabled === true,
      category:
        typeof record.category === 'string' && record.category
          ? record.category
          : null,
      createdAt: typeof record.createdAt === 'string' ? record.createdAt : now,
      updatedAt: typeof record.updatedAt === 'string' ? record.updatedAt : now,
    };
  }

  private async safeReadJson(filePath: string): Promise<unknown> {
    try {
      const raw = await fs.readFile(filePath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      return null;
    }
  }

  private async safeWriteJson(
    filePath: string,
    payload: unknown,
  ): Promise<void> {
    const dir = path.dirname(filePath);
    const base = path.basename(filePath);
    const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(
        tmpPath,
        `${JSON.stringify(payload, null, 2)}\n`,
        'utf-8',
      );
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      await fs.unlink(tmpPath).catch(() => undefined);
      throw error;
    }
  }
}
