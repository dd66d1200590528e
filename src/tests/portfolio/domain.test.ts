/**
 * Experience and connection lookup helpers
 */

import { describe, it, expect } from 'vitest';
import {
  careerSpan,
  effectiveEndYear,
  formatRolePeriod,
  isCurrentRole,
  roleDuration
} from '../../portfolio/domain/experience';
import {
  connectionNodes,
  nodeCategory,
  nodeColor,
  nodeSize,
  titleCase
} from '../../portfolio/domain/connections';
import type { ConnectionGraphData, Role } from '../../portfolio/types';

const PAST: Role = {
  company: 'Acme',
  title: 'Analyst',
  startYear: 2018,
  endYear: 2021,
  color: '#112233',
  responsibilities: ['Reporting']
};

const CURRENT: Role = { ...PAST, company: 'Globex', startYear: 2021, endYear: null };

const GRAPH: ConnectionGraphData = {
  edges: [['SQL', 'DBT'], ['DBT', 'Snowflake'], ['SQL', 'Snowflake']],
  nodeCategories: { SQL: 'language', DBT: 'data_tool', Flyte: 'infrastructure' },
  categoryColors: { language: '#FF6B6B' },
  nodeSizes: { SQL: 95 }
};

describe('Experience helpers', () => {
  it('should tell ongoing roles apart', () => {
    expect(isCurrentRole(PAST)).toBe(false);
    expect(isCurrentRole(CURRENT)).toBe(true);
  });

  it('should measure durations against the current year for ongoing roles', () => {
    expect(roleDuration(PAST, 2026)).toBe(3);
    expect(roleDuration(CURRENT, 2026)).toBe(5);
    expect(effectiveEndYear(CURRENT, 2026)).toBe(2026);
  });

  it('should format the period', () => {
    expect(formatRolePeriod(PAST)).toBe('2018 - 2021');
    expect(formatRolePeriod(CURRENT)).toBe('2021 - Present');
  });

  it('should measure the career span', () => {
    expect(careerSpan([PAST, CURRENT], 2026)).toBe(8);
    expect(careerSpan([], 2026)).toBe(0);
  });
});

describe('Connection lookups', () => {
  it('should fall back to the competency category', () => {
    expect(nodeCategory(GRAPH, 'SQL')).toBe('language');
    expect(nodeCategory(GRAPH, 'Writing')).toBe('competency');
  });

  it('should use grey for categories without a color', () => {
    expect(nodeColor(GRAPH, 'SQL')).toBe('#FF6B6B');
    expect(nodeColor(GRAPH, 'DBT')).toBe('#999999');
  });

  it('should default the node size to 50', () => {
    expect(nodeSize(GRAPH, 'SQL')).toBe(95);
    expect(nodeSize(GRAPH, 'DBT')).toBe(50);
  });

  it('should list nodes in order of first appearance', () => {
    expect(connectionNodes(GRAPH)).toEqual(['SQL', 'DBT', 'Snowflake']);
  });

  it('should title-case category tags', () => {
    expect(titleCase('data_tool')).toBe('Data Tool');
    expect(titleCase('ml_tool')).toBe('Ml Tool');
    expect(titleCase('language')).toBe('Language');
  });
});
