/**
 * Portfolio Data-Quality Validator
 * 
 * Cross-table consistency checks that a per-field schema cannot express:
 * chronology of roles, ranges, banding, graph hygiene, and that the tables
 * agree on names.
 */

import type { ValidationError, ValidationResult } from '../../shared/validation/types';
import { findBandingProblems, MAX_SCORE, MIN_SCORE, PROFICIENCY_BANDS } from '../domain/proficiency';
import { connectionNodes } from '../domain/connections';
import { isCurrentRole } from '../domain/experience';
import type { PortfolioData, ProficiencyBand, Role } from '../types';

export interface PortfolioValidationResult extends ValidationResult {
  /** Suspicious but allowed, e.g. a pair present in both directions */
  warnings: string[];
}

export interface PortfolioValidationOptions {
  currentYear: number;
  bands?: readonly ProficiencyBand[];
}

function inRange(value: number): boolean {
  return Number.isFinite(value) && value >= MIN_SCORE && value <= MAX_SCORE;
}

export function validateRoles(roles: readonly Role[], currentYear: number): ValidationError[] {
  const errors: ValidationError[] = [];

  roles.forEach((role, index) => {
    const field = `roles.${index}`;
    if (role.startYear > currentYear) {
      errors.push({ field: `${field}.startYear`, message: `${role.company} start year is in the future` });
    }
    if (role.endYear !== null) {
      if (role.endYear < role.startYear) {
        errors.push({ field: `${field}.endYear`, message: `${role.company} end year before start year` });
      }
      if (role.endYear > currentYear) {
        errors.push({ field: `${field}.endYear`, message: `${role.company} end year is in the future` });
      }
    }
  });

  for (let i = 0; i < roles.length - 1; i++) {
    const current = roles[i];
    const next = roles[i + 1];
    if (current.startYear > next.startYear) {
      errors.push({
        field: `roles.${i + 1}.startYear`,
        message: `${current.company} should come before ${next.company}`
      });
    }
    // A boundary year may be shared; a later role may not start before the previous one ends
    if (current.endYear !== null && current.endYear > next.startYear) {
      errors.push({
        field: `roles.${i + 1}.startYear`,
        message: `Role overlap detected: ${current.company} ends in ${current.endYear}, ` +
          `but ${next.company} starts in ${next.startYear}`
      });
    }
  }

  const currentIndexes = roles
    .map((role, index) => (isCurrentRole(role) ? index : -1))
    .filter(index => index >= 0);

  if (currentIndexes.length !== 1) {
    errors.push({
      field: 'roles',
      message: `Should have exactly one current role, found ${currentIndexes.length}`
    });
  } else if (currentIndexes[0] !== roles.length - 1) {
    errors.push({
      field: `roles.${currentIndexes[0]}.endYear`,
      message: 'Current role should be last in list'
    });
  }

  return errors;
}

export function validateScores(data: PortfolioData): ValidationError[] {
  const errors: ValidationError[] = [];

  data.skills.forEach((skill, index) => {
    if (!inRange(skill.score)) {
      errors.push({ field: `skills.${index}.score`, message: `${skill.name} score ${skill.score} out of range` });
    } else if (!PROFICIENCY_BANDS.some(band => band.minScore <= skill.score && skill.score <= band.maxScore)) {
      errors.push({ field: `skills.${index}.score`, message: `${skill.name} score ${skill.score} has no proficiency level` });
    }
  });

  const seen = new Set<string>();
  data.skills.forEach((skill, index) => {
    if (seen.has(skill.name)) {
      errors.push({ field: `skills.${index}.name`, message: `Duplicate skill ${skill.name}` });
    }
    seen.add(skill.name);
  });

  for (const [company, weights] of Object.entries(data.skillsByRole)) {
    for (const [skill, percentage] of Object.entries(weights)) {
      if (!inRange(percentage)) {
        errors.push({
          field: `skillsByRole.${company}.${skill}`,
          message: `${company} - ${skill}: ${percentage}% out of range`
        });
      }
    }
  }

  for (const [name, score] of Object.entries(data.skillsWithTools)) {
    if (!inRange(score)) {
      errors.push({ field: `skillsWithTools.${name}`, message: `${name} score ${score} out of range` });
    }
  }

  return errors;
}

export function validateSkillsByRole(data: PortfolioData): ValidationError[] {
  const companies = new Set(data.roles.map(role => role.company));
  const errors: ValidationError[] = [];

  for (const [company, weights] of Object.entries(data.skillsByRole)) {
    if (!companies.has(company)) {
      errors.push({ field: `skillsByRole.${company}`, message: `${company} does not match any role` });
    }
    if (Object.keys(weights).length === 0) {
      errors.push({ field: `skillsByRole.${company}`, message: `${company} has no skills defined` });
    }
  }

  return errors;
}

export function validateConnections(data: PortfolioData): { errors: ValidationError[]; warnings: string[] } {
  const errors: ValidationError[] = [];
  const warnings: string[] = [];
  const pairs = new Set<string>();
  const key = (source: string, target: string) => JSON.stringify([source, target]);

  data.connections.edges.forEach(([source, target], index) => {
    if (source === target) {
      errors.push({ field: `connections.edges.${index}`, message: `Self-connection detected: ${source} -> ${target}` });
    }
    const pair = key(source, target);
    if (pairs.has(pair)) {
      errors.push({ field: `connections.edges.${index}`, message: `Duplicate connection: ${source} -> ${target}` });
    }
    pairs.add(pair);
  });

  for (const [source, target] of data.connections.edges) {
    if (source < target && pairs.has(key(target, source))) {
      warnings.push(`Bidirectional connection: ${source} <-> ${target}`);
    }
  }

  const nodes = new Set(connectionNodes(data.connections));
  data.skills.forEach((skill, index) => {
    if (!nodes.has(skill.name)) {
      errors.push({ field: `skills.${index}.name`, message: `Core skill missing from network: ${skill.name}` });
    }
  });

  return { errors, warnings };
}

/**
 * Run every data-quality check over the portfolio tables
 */
export function validatePortfolio(
  data: PortfolioData,
  options: PortfolioValidationOptions
): PortfolioValidationResult {
  const bandingErrors = findBandingProblems(options.bands ?? PROFICIENCY_BANDS)
    .map(message => ({ field: 'proficiencyBands', message }));
  const connectionResult = validateConnections(data);

  const errors = [
    ...validateRoles(data.roles, options.currentYear),
    ...validateScores(data),
    ...validateSkillsByRole(data),
    ...bandingErrors,
    ...connectionResult.errors
  ];

  return {
    isValid: errors.length === 0,
    errors,
    warnings: connectionResult.warnings
  };
}
