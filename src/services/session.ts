import type { Card, Database, TodaySession } from '../types';
import {
  getCardsCreatedBetween,
  getDueCards,
  getStruggleCards,
  getYesterdayNotMasteredCards,
  type TimeRange,
} from '../db/queries';
import { ValidationError } from '../errors';
import { todayBounds, yesterdayBounds, type DayBounds } from '../utils/time';

export const DEFAULT_SESSION_LIMIT = 30;
export const MAX_SESSION_LIMIT = 200;

export interface SessionOptions {
  limit: number;
  now: Date;
  timeZone: string;
}

export interface ReviewBuckets {
  due: Card[];
  yesterdayNotMastered: Card[];
  struggle: Card[];
}

function toRange(bounds: DayBounds): TimeRange {
  return { start: bounds.start.toISOString(), end: bounds.end.toISOString() };
}

/**
 * Concatenate the review buckets in priority order (overdue, failed
 * yesterday, repeatedly re-added), keep the first occurrence of each card
 * and cut the result at `limit`.
 */
export function composeReviewQueue(buckets: ReviewBuckets, limit: number): Card[] {
  const seen = new Set<string>();
  const queue: Card[] = [];
  for (const card of [...buckets.due, ...buckets.yesterdayNotMastered, ...buckets.struggle]) {
    if (queue.length >= limit) break;
    if (seen.has(card.id)) continue;
    seen.add(card.id);
    queue.push(card);
  }
  return queue;
}

/**
 * Build today's study session: every card created today (local time), plus
 * a capped review queue drawn from the other cards.
 */
export function getTodaySession(db: Database, options: SessionOptions): TodaySession {
  const { limit, now, timeZone } = options;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SESSION_LIMIT) {
    throw new ValidationError(`limit must be an integer in range 1..${MAX_SESSION_LIMIT}`, 'limit');
  }

  const today = toRange(todayBounds(now, timeZone));
  const yesterday = toRange(yesterdayBounds(now, timeZone));

  const todayNew = getCardsCreatedBetween(db, today);
  const review = composeReviewQueue(
    {
      due: getDueCards(db, now.toISOString(), today, limit),
      yesterdayNotMastered: getYesterdayNotMasteredCards(db, yesterday, today, limit),
      struggle: getStruggleCards(db, today, limit),
    },
    limit
  );

  return { todayNew, review };
}
