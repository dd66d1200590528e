/**
 * Proficiency Levels
 * 
 * Static banding of the 0-100 score scale:
 * - 0-30   Awareness: familiar with concepts, not yet applied in production
 * - 31-60  Applied: used in real projects, comfortable with the basics
 * - 61-85  Proficient: daily usage, solves complex problems
 * - 86-100 Expert: deep expertise, teaches others
 */

import { ErrorHandler } from '../../shared/errors';
import { ProficiencyLevel } from '../types';
import type { ProficiencyBand, SkillProficiency } from '../types';

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

/**
 * Bands in ascending score order
 */
export const PROFICIENCY_BANDS: readonly ProficiencyBand[] = Object.freeze([
  {
    level: ProficiencyLevel.AWARENESS,
    minScore: 0,
    maxScore: 30,
    label: 'Awareness',
    description: 'Learning / Awareness'
  },
  {
    level: ProficiencyLevel.APPLIED,
    minScore: 31,
    maxScore: 60,
    label: 'Applied',
    description: 'Applied in Projects'
  },
  {
    level: ProficiencyLevel.PROFICIENT,
    minScore: 61,
    maxScore: 85,
    label: 'Proficient',
    description: 'Proficient Daily Use'
  },
  {
    level: ProficiencyLevel.EXPERT,
    minScore: 86,
    maxScore: 100,
    label: 'Expert',
    description: 'Expert / Teaching Others'
  }
]);

/**
 * Band containing the score.
 * @throws AppError (VALIDATION) when no band contains it
 */
export function bandForScore(score: number): ProficiencyBand {
  const band = PROFICIENCY_BANDS.find(
    candidate => candidate.minScore <= score && score <= candidate.maxScore
  );
  if (!band) {
    throw ErrorHandler.createValidationError(
      `Score ${score} out of range (${MIN_SCORE}-${MAX_SCORE})`,
      `No proficiency band contains ${score}`,
      { score }
    );
  }
  return band;
}

export function proficiencyFromScore(score: number): ProficiencyLevel {
  return bandForScore(score).level;
}

export function getBand(level: ProficiencyLevel): ProficiencyBand {
  const band = PROFICIENCY_BANDS.find(candidate => candidate.level === level);
  if (!band) {
    throw ErrorHandler.createUnexpectedError(`Unknown proficiency level ${level}`);
  }
  return band;
}

export function skillLevelDescription(skill: SkillProficiency): string {
  return bandForScore(skill.score).description;
}

/**
 * Problems with the banding itself: gaps, overlaps, or not covering
 * [MIN_SCORE, MAX_SCORE]. Empty when the bands partition the scale.
 */
export function findBandingProblems(bands: readonly ProficiencyBand[] = PROFICIENCY_BANDS): string[] {
  const problems: string[] = [];
  if (bands.length === 0) {
    return ['No proficiency bands defined'];
  }

  const sorted = [...bands].sort((a, b) => a.minScore - b.minScore);

  if (sorted[0].minScore !== MIN_SCORE) {
    problems.push(`Bands start at ${sorted[0].minScore}, expected ${MIN_SCORE}`);
  }
  const last = sorted[sorted.length - 1];
  if (last.maxScore !== MAX_SCORE) {
    problems.push(`Bands end at ${last.maxScore}, expected ${MAX_SCORE}`);
  }

  for (const band of sorted) {
    if (band.minScore > band.maxScore) {
      problems.push(`${band.label}: min ${band.minScore} is above max ${band.maxScore}`);
    }
  }

  for (let i = 0; i < sorted.length - 1; i++) {
    const current = sorted[i];
    const next = sorted[i + 1];
    if (next.minScore <= current.maxScore) {
      problems.push(`${current.label} and ${next.label} overlap`);
    } else if (next.minScore > current.maxScore + 1) {
      problems.push(`Gap between ${current.label} and ${next.label}`);
    }
  }

  return problems;
}
