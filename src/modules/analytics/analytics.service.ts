/**
 * src/modules/analytics/analytics.service.ts
 *
 * WHY:
 * - Read-only dashboards over the caller's stored emails.
 * - Loads the window once through EmailRepo.listFactsInWindow; aggregation is pure (aggregations/).
 *
 * RULES:
 * - Windows are [now - days, now] on received_date.
 * - Category trends also load the preceding window of equal length.
 */

import type { EmailFacts, EmailRepo } from '../emails';

import { buildCategoryTrends, type CategoryTrends } from './aggregations/categories.aggregation';
import { buildOverview, type AnalyticsOverview } from './aggregations/overview.aggregation';
import { buildProductivity, type ProductivityReport } from './aggregations/productivity.aggregation';
import { buildSenderStats, type SenderStats } from './aggregations/senders.aggregation';
import {
  buildTimeSeries,
  type Granularity,
  type TimeSeriesData,
} from './aggregations/time-series.aggregation';
import { buildVolume, type VolumePeriod, type VolumeReport } from './aggregations/volume.aggregation';

const DAY_MS = 24 * 60 * 60 * 1000;

export type AnalyticsServiceDeps = {
  emailRepo: EmailRepo;
  now?: () => Date;
};

export class AnalyticsService {
  private readonly now: () => Date;

  constructor(private readonly deps: AnalyticsServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private async window(userId: string, days: number): Promise<EmailFacts[]> {
    const to = this.now();
    const from = new Date(to.getTime() - days * DAY_MS);
    return this.deps.emailRepo.listFactsInWindow(userId, from, to);
  }

  async overview(userId: string, days: number): Promise<AnalyticsOverview> {
    return buildOverview(await this.window(userId, days), days);
  }

  async senders(userId: string, days: number, limit: number): Promise<SenderStats[]> {
    return buildSenderStats(await this.window(userId, days), limit);
  }

  async timeSeries(userId: string, days: number, granularity: Granularity): Promise<TimeSeriesData> {
    return buildTimeSeries(await this.window(userId, days), granularity);
  }

  async categoryTrends(userId: string, days: number): Promise<CategoryTrends> {
    const to = this.now();
    const start = new Date(to.getTime() - days * DAY_MS);
    const previousStart = new Date(start.getTime() - days * DAY_MS);

    const emails = await this.deps.emailRepo.listFactsInWindow(userId, previousStart, to);
    const current: EmailFacts[] = [];
    const previous: EmailFacts[] = [];
    for (const e of emails) {
      if (e.receivedDate && e.receivedDate < start) previous.push(e);
      else current.push(e);
    }

    return buildCategoryTrends({ current, previous, days });
  }

  async productivity(userId: string, days: number): Promise<ProductivityReport> {
    return buildProductivity(await this.window(userId, days));
  }

  async volume(userId: string, days: number, period: VolumePeriod): Promise<VolumeReport> {
    return buildVolume(await this.window(userId, days), period, days);
  }
}
