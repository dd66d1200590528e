/**
 * Portfolio Data
 * 
 * Loads the JSON tables beside this file, checks them against the zod
 * schemas and freezes the result. Everything is read once at import time.
 */

import { z } from 'zod';
import experienceJson from './experience.json';
import skillsJson from './skills.json';
import connectionsJson from './connections.json';
import { ErrorHandler } from '../../shared/errors';
import { formatValidationErrors, zodErrorToValidationErrors } from '../../shared/validation';
import {
  ConnectionsFileSchema,
  ExperienceFileSchema,
  SkillsFileSchema
} from '../validation/schemas';
import type {
  Connection,
  ConnectionGraphData,
  PortfolioData,
  Role,
  SkillProficiency,
  SkillScores,
  SkillsByRole
} from '../types';

/**
 * Raw (unvalidated) table contents
 */
export interface PortfolioSources {
  experience: unknown;
  skills: unknown;
  connections: unknown;
}

export const DEFAULT_SOURCES: PortfolioSources = {
  experience: experienceJson,
  skills: skillsJson,
  connections: connectionsJson
};

function parseTable<T extends z.ZodTypeAny>(schema: T, value: unknown, file: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const errors = zodErrorToValidationErrors(result.error);
    throw ErrorHandler.createDataError(
      `Invalid portfolio data in ${file}`,
      formatValidationErrors(errors),
      { file, errors }
    );
  }
  return result.data;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Parse and freeze the portfolio tables.
 * @throws AppError (DATA) naming the file and the failing fields
 */
export function loadPortfolioData(sources: PortfolioSources = DEFAULT_SOURCES): PortfolioData {
  const experience = parseTable(ExperienceFileSchema, sources.experience, 'experience.json');
  const skills = parseTable(SkillsFileSchema, sources.skills, 'skills.json');
  const connections = parseTable(ConnectionsFileSchema, sources.connections, 'connections.json');

  return deepFreeze({
    metadata: experience.metadata,
    roles: experience.roles,
    skills: skills.proficiencies,
    skillsByRole: skills.skillsByRole,
    skillsWithTools: skills.skillsWithTools,
    connections
  });
}

export const PORTFOLIO: PortfolioData = loadPortfolioData();

export const EXPERIENCE: readonly Role[] = PORTFOLIO.roles;
export const SKILLS: readonly SkillProficiency[] = PORTFOLIO.skills;
export const SKILLS_BY_ROLE: SkillsByRole = PORTFOLIO.skillsByRole;
export const SKILLS_WITH_TOOLS: SkillScores = PORTFOLIO.skillsWithTools;
export const CONNECTION_GRAPH: ConnectionGraphData = PORTFOLIO.connections;
export const TOOL_CONNECTIONS: readonly Connection[] = PORTFOLIO.connections.edges;
