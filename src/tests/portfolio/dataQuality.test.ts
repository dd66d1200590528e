/**
 * Data quality tests for the built-in portfolio tables
 */

import { describe, it, expect } from 'vitest';
import {
  CONNECTION_GRAPH,
  EXPERIENCE,
  PORTFOLIO,
  SKILLS,
  SKILLS_BY_ROLE,
  SKILLS_WITH_TOOLS,
  TOOL_CONNECTIONS
} from '../../portfolio/data';
import { careerSpan, isCurrentRole, roleDuration } from '../../portfolio/domain/experience';
import { connectionNodes } from '../../portfolio/domain/connections';
import { proficiencyFromScore } from '../../portfolio/domain/proficiency';
import { validatePortfolio } from '../../portfolio/validation';

const CURRENT_YEAR = 2026;

describe('Experience data', () => {
  it('should not be empty', () => {
    expect(EXPERIENCE.length).toBeGreaterThan(0);
  });

  it('should be in chronological order without overlaps', () => {
    for (let i = 0; i < EXPERIENCE.length - 1; i++) {
      const current = EXPERIENCE[i];
      const next = EXPERIENCE[i + 1];
      expect(current.startYear).toBeLessThanOrEqual(next.startYear);
      if (current.endYear !== null) {
        expect(current.endYear).toBeLessThanOrEqual(next.startYear);
      }
    }
  });

  it('should have exactly one current role, and it is the last one', () => {
    const current = EXPERIENCE.filter(isCurrentRole);
    expect(current).toHaveLength(1);
    expect(current[0]).toBe(EXPERIENCE[EXPERIENCE.length - 1]);
    expect(current[0].title).toBe('Data Scientist');
  });

  it('should have a reasonable duration for every role', () => {
    for (const role of EXPERIENCE) {
      const duration = roleDuration(role, CURRENT_YEAR);
      expect(duration).toBeGreaterThan(0);
      expect(duration).toBeLessThanOrEqual(50);
    }
  });

  it('should span a reasonable career', () => {
    expect(careerSpan(EXPERIENCE, CURRENT_YEAR)).toBe(20);
  });

  it('should give every role a title, color and responsibilities', () => {
    for (const role of EXPERIENCE) {
      expect(role.title).not.toBe('');
      expect(role.color).toMatch(/^#[0-9A-Fa-f]{6}$/);
      expect(role.responsibilities.length).toBeGreaterThan(0);
    }
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(EXPERIENCE)).toBe(true);
    expect(Object.isFrozen(EXPERIENCE[0])).toBe(true);
    expect(Object.isFrozen(EXPERIENCE[0].responsibilities)).toBe(true);
  });
});

describe('Skills data', () => {
  it('should keep every score in range with a proficiency level', () => {
    for (const skill of SKILLS) {
      expect(skill.score).toBeGreaterThanOrEqual(0);
      expect(skill.score).toBeLessThanOrEqual(100);
      expect(() => proficiencyFromScore(skill.score)).not.toThrow();
    }
  });

  it('should keep every role weight in range', () => {
    for (const weights of Object.values(SKILLS_BY_ROLE)) {
      for (const percentage of Object.values(weights)) {
        expect(percentage).toBeGreaterThanOrEqual(0);
        expect(percentage).toBeLessThanOrEqual(100);
      }
    }
  });

  it('should key role weights by companies from the experience table', () => {
    const companies = new Set(EXPERIENCE.map(role => role.company));
    for (const company of Object.keys(SKILLS_BY_ROLE)) {
      expect(companies.has(company)).toBe(true);
    }
  });

  it('should show the current employer using data analysis heavily', () => {
    expect(SKILLS_BY_ROLE['Schibsted']['Data Analysis']).toBeGreaterThanOrEqual(90);
  });

  it('should list 18 skills and tools for the treemap', () => {
    expect(Object.keys(SKILLS_WITH_TOOLS)).toHaveLength(18);
  });
});

describe('Connection data', () => {
  it('should have no self-connections', () => {
    for (const [source, target] of TOOL_CONNECTIONS) {
      expect(source).not.toBe(target);
    }
  });

  it('should have no duplicate connections', () => {
    const unique = new Set(TOOL_CONNECTIONS.map(pair => pair.join('\u0000')));
    expect(unique.size).toBe(TOOL_CONNECTIONS.length);
  });

  it('should include every proficiency skill in the network', () => {
    const nodes = new Set(connectionNodes(CONNECTION_GRAPH));
    for (const skill of SKILLS) {
      expect(nodes.has(skill.name)).toBe(true);
    }
  });

  it('should have 19 nodes and 34 edges', () => {
    expect(connectionNodes(CONNECTION_GRAPH)).toHaveLength(19);
    expect(TOOL_CONNECTIONS).toHaveLength(34);
  });
});

describe('Portfolio validator on built-in data', () => {
  it('should pass every check without warnings', () => {
    const result = validatePortfolio(PORTFOLIO, { currentYear: CURRENT_YEAR });
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.isValid).toBe(true);
  });
});
