/**
 * Portfolio data loading tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_SOURCES, loadPortfolioData } from '../../portfolio/data';
import { AppError, ErrorCategory } from '../../shared/errors';

const skills = {
  proficiencies: [
    { name: 'SQL', score: 150, yearsExperience: 5, lastUsed: 'Current', context: 'Daily reporting queries' }
  ],
  skillsByRole: {},
  skillsWithTools: {}
};

function captureError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an AppError');
}

describe('loadPortfolioData', () => {
  it('should load the bundled tables', () => {
    const data = loadPortfolioData();

    expect(data.roles).toHaveLength(7);
    expect(data.skills).toHaveLength(6);
    expect(Object.keys(data.skillsByRole)).toHaveLength(6);
    expect(data.connections.edges).toHaveLength(34);
    expect(data.metadata.lastUpdated).toBe('2025-12-10');
  });

  it('should freeze the loaded data', () => {
    const data = loadPortfolioData();

    expect(Object.isFrozen(data)).toBe(true);
    expect(Object.isFrozen(data.roles)).toBe(true);
    expect(Object.isFrozen(data.connections.edges[0])).toBe(true);
    expect(Object.isFrozen(data.skillsByRole['Schibsted'])).toBe(true);
  });

  it('should reject a table that fails its schema with a DATA error naming the file', () => {
    const error = captureError(() => loadPortfolioData({ ...DEFAULT_SOURCES, skills }));

    expect(error.category).toBe(ErrorCategory.DATA);
    expect(error.recoverable).toBe(false);
    expect(error.userMessage).toBe('Invalid portfolio data in skills.json');
    expect(error.technicalDetails).toBe('proficiencies.0.score: Value must be between 0 and 100');
    expect(error.context?.file).toBe('skills.json');
  });

  it('should reject a role whose end year precedes its start year', () => {
    const experience = {
      metadata: { source: 'test', lastUpdated: '2025-01-01', methodology: '' },
      roles: [
        {
          company: 'Acme',
          title: 'Analyst',
          startYear: 2015,
          endYear: 2010,
          color: '#112233',
          responsibilities: ['Reporting']
        }
      ]
    };

    const error = captureError(() => loadPortfolioData({ ...DEFAULT_SOURCES, experience }));

    expect(error.userMessage).toBe('Invalid portfolio data in experience.json');
    expect(error.technicalDetails).toBe('roles.0.endYear: End year must be after or equal to start year');
  });

  it('should reject an unknown node category', () => {
    const connections = {
      edges: [['SQL', 'Excel']],
      nodeCategories: { Excel: 'spreadsheet' },
      categoryColors: {},
      nodeSizes: {}
    };

    const error = captureError(() => loadPortfolioData({ ...DEFAULT_SOURCES, connections }));

    expect(error.userMessage).toBe('Invalid portfolio data in connections.json');
    expect(error.technicalDetails.startsWith('nodeCategories.Excel: ')).toBe(true);
  });

  it('should reject a non-object source', () => {
    const error = captureError(() => loadPortfolioData({ ...DEFAULT_SOURCES, experience: 'not a table' }));

    expect(error.category).toBe(ErrorCategory.DATA);
    expect(error.technicalDetails).toBe('(root): Expected object, received string');
  });
});
