import { subDays } from 'date-fns';
import type { AnalyticsOverview, Database, TopicStat } from '../types';
import {
  aggregateReviews,
  aggregateReviewsByTopic,
  countCards,
  countCardsByTopic,
  countDueCards,
} from '../db/queries';
import { ValidationError } from '../errors';

export const DEFAULT_ANALYTICS_DAYS = 30;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function ratio(part: number, total: number): number {
  return total > 0 ? round2(part / total) : 0;
}

function windowStart(days: number, now: Date): string {
  if (!Number.isInteger(days) || days < 1 || days > 365) {
    throw new ValidationError('days must be between 1 and 365', 'days');
  }
  return subDays(now, days).toISOString();
}

export function getOverview(db: Database, days: number = DEFAULT_ANALYTICS_DAYS, now: Date = new Date()): AnalyticsOverview {
  const since = windowStart(days, now);
  const reviews = aggregateReviews(db, since);

  return {
    days,
    totalVocabs: countCards(db),
    dueNow: countDueCards(db, now.toISOString()),
    reviewedCount: reviews.reviewedCount,
    avgGrade: ratio(reviews.gradeSum, reviews.reviewedCount),
    accuracyRate: ratio(reviews.passedCount, reviews.reviewedCount),
    typingAccuracy: ratio(reviews.typingPassedCount, reviews.typingCount),
  };
}

/**
 * Per-topic card counts and review performance. A review counts once for
 * every topic of its card.
 */
export function getTopicStats(db: Database, days: number = DEFAULT_ANALYTICS_DAYS, now: Date = new Date()): TopicStat[] {
  const since = windowStart(days, now);
  const stats = new Map<string, TopicStat>();

  for (const { topic, vocabCount } of countCardsByTopic(db)) {
    stats.set(topic, { topic, vocabCount, reviewedCount: 0, avgGrade: 0 });
  }
  for (const { topic, reviewedCount, gradeSum } of aggregateReviewsByTopic(db, since)) {
    const stat = stats.get(topic) ?? { topic, vocabCount: 0, reviewedCount: 0, avgGrade: 0 };
    stat.reviewedCount = reviewedCount;
    stat.avgGrade = ratio(gradeSum, reviewedCount);
    stats.set(topic, stat);
  }

  return [...stats.values()].sort((a, b) => (a.topic < b.topic ? -1 : a.topic > b.topic ? 1 : 0));
}
