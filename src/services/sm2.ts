import { ValidationError } from '../errors';
import { addDaysExact } from '../utils/time';

export const STARTING_EASE = 2.5;
export const MINIMUM_EASE = 1.3;
export const MAXIMUM_EASE = 3.0;
export const LAPSE_EASE_PENALTY = 0.2;

export interface SM2State {
  easeFactor: number;
  intervalDays: number;
  repetitions: number;
  lapses: number;
}

export interface SM2Result extends SM2State {
  dueAt: Date;
  lastReviewedAt: Date;
}

export interface InitialSchedule extends SM2State {
  dueAt: Date;
  lastReviewedAt: null;
}

export interface ReaddPenalty {
  easeFactor: number;
  repetitions: number;
  intervalDays: number;
  dueAt: Date;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function clampEase(easeFactor: number): number {
  return clamp(easeFactor, MINIMUM_EASE, MAXIMUM_EASE);
}

// Ease is persisted with two decimals
function roundEase(easeFactor: number): number {
  return Math.round(easeFactor * 100) / 100;
}

/**
 * Schedule for a card that has never been reviewed: due immediately.
 */
export function initialState(now: Date): InitialSchedule {
  return {
    easeFactor: STARTING_EASE,
    intervalDays: 0,
    repetitions: 0,
    lapses: 0,
    dueAt: now,
    lastReviewedAt: null,
  };
}

/**
 * SM-2 Spaced Repetition Algorithm
 *
 * Grades run 0-5 as in SuperMemo. Anything below 3 is a lapse: progress
 * resets and the card is due again right away. A passing grade walks the
 * 1 day / 6 days / interval * ease ladder and nudges the ease factor with
 * EF' = EF + (0.1 - (5-q) * (0.08 + (5-q) * 0.02)).
 *
 * @param grade - integer 0..5
 */
export function applyReview(state: SM2State, grade: number, now: Date): SM2Result {
  if (!Number.isInteger(grade) || grade < 0 || grade > 5) {
    throw new ValidationError('SM-2 grade must be an integer in range 0..5', 'grade');
  }

  let easeFactor = state.easeFactor;
  let interval = state.intervalDays;
  let repetitions = state.repetitions;
  let lapses = state.lapses;
  let dueAt: Date;

  if (grade < 3) {
    repetitions = 0;
    interval = 0;
    lapses += 1;
    easeFactor = clampEase(easeFactor - LAPSE_EASE_PENALTY);
    dueAt = now;
  } else {
    if (repetitions === 0) {
      interval = 1;
    } else if (repetitions === 1) {
      interval = 6;
    } else {
      interval = Math.max(1, Math.round(interval * easeFactor));
    }

    repetitions += 1;
    const q = 5 - grade;
    easeFactor = clampEase(easeFactor + (0.1 - q * (0.08 + q * 0.02)));
    dueAt = addDaysExact(now, interval);
  }

  return {
    easeFactor: roundEase(easeFactor),
    intervalDays: interval,
    repetitions,
    lapses,
    dueAt,
    lastReviewedAt: now,
  };
}

/**
 * Penalty for entering a term that already exists: same ease drop as a
 * lapse and a reset schedule, but the lapse counter is left alone.
 */
export function applyReaddPenalty(state: SM2State, now: Date): ReaddPenalty {
  return {
    easeFactor: roundEase(clampEase(state.easeFactor - LAPSE_EASE_PENALTY)),
    repetitions: 0,
    intervalDays: 0,
    dueAt: now,
  };
}

/**
 * A card is due once its due time has passed
 */
export function isDue(dueAt: string, now: Date): boolean {
  return new Date(dueAt).getTime() <= now.getTime();
}
