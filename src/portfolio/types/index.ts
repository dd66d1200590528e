/**
 * Portfolio Types
 * 
 * Core data model shared by the data tables, the validator and the chart
 * builders.
 */

// ============================================================================
// Experience
// ============================================================================

/**
 * A discrete period of employment
 */
export interface Role {
  company: string;
  title: string;
  startYear: number;
  /** null while the role is ongoing */
  endYear: number | null;
  color: string;
  responsibilities: readonly string[];
}

export interface ExperienceMetadata {
  source: string;
  lastUpdated: string;
  methodology: string;
}

// ============================================================================
// Skills
// ============================================================================

/**
 * Qualitative proficiency bands over the 0-100 score scale
 */
export enum ProficiencyLevel {
  AWARENESS = 'AWARENESS',
  APPLIED = 'APPLIED',
  PROFICIENT = 'PROFICIENT',
  EXPERT = 'EXPERT'
}

export interface ProficiencyBand {
  level: ProficiencyLevel;
  minScore: number;
  maxScore: number;
  /** Short label, e.g. "Applied" */
  label: string;
  description: string;
}

/**
 * Self-assessed proficiency in a single skill
 */
export interface SkillProficiency {
  name: string;
  /** 0-100 */
  score: number;
  yearsExperience: number;
  /** e.g. "2025-01" or "Current" */
  lastUsed: string;
  /** How and where the skill was applied */
  context: string;
}

/**
 * company -> skill name -> percentage of the role's effort (0-100).
 * Represents time allocation, not mastery.
 */
export type SkillsByRole = Readonly<Record<string, Readonly<Record<string, number>>>>;

/**
 * skill or tool name -> score (0-100)
 */
export type SkillScores = Readonly<Record<string, number>>;

// ============================================================================
// Connection graph
// ============================================================================

export type NodeCategory =
  | 'language'
  | 'competency'
  | 'data_tool'
  | 'viz_tool'
  | 'ml_tool'
  | 'infrastructure';

/**
 * Undirected association between two skills or tools
 */
export type Connection = readonly [source: string, target: string];

export interface ConnectionGraphData {
  edges: readonly Connection[];
  nodeCategories: Readonly<Record<string, NodeCategory>>;
  categoryColors: Readonly<Partial<Record<NodeCategory, string>>>;
  nodeSizes: Readonly<Record<string, number>>;
}

// ============================================================================
// Aggregate
// ============================================================================

export interface PortfolioData {
  metadata: ExperienceMetadata;
  roles: readonly Role[];
  skills: readonly SkillProficiency[];
  skillsByRole: SkillsByRole;
  skillsWithTools: SkillScores;
  connections: ConnectionGraphData;
}
