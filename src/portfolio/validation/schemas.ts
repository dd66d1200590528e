/**
 * Portfolio Validation Schemas
 * 
 * Zod schemas for the data tables under src/portfolio/data.
 */

import { z } from 'zod';
import {
  HexColorSchema,
  ISODateSchema,
  NonEmptyStringSchema,
  PercentageSchema,
  YearSchema
} from '../../shared/validation/schemas';

// ============================================================================
// Experience
// ============================================================================

export const RoleSchema = z.object({
  company: NonEmptyStringSchema,
  title: NonEmptyStringSchema,
  startYear: YearSchema,
  endYear: YearSchema.nullable(),
  color: HexColorSchema,
  responsibilities: z.array(NonEmptyStringSchema).min(1, 'A role needs at least one responsibility')
}).refine(
  role => role.endYear === null || role.endYear >= role.startYear,
  { message: 'End year must be after or equal to start year', path: ['endYear'] }
);

export const ExperienceMetadataSchema = z.object({
  source: NonEmptyStringSchema,
  lastUpdated: ISODateSchema,
  methodology: z.string()
});

export const ExperienceFileSchema = z.object({
  metadata: ExperienceMetadataSchema,
  roles: z.array(RoleSchema).min(1, 'Experience data should not be empty')
});

// ============================================================================
// Skills
// ============================================================================

export const SkillProficiencySchema = z.object({
  name: NonEmptyStringSchema,
  score: PercentageSchema,
  yearsExperience: z.number().positive('Years of experience must be positive').max(60),
  lastUsed: NonEmptyStringSchema,
  context: z.string().trim().min(10, 'Context is too brief')
});

export const SkillWeightsSchema = z.record(z.string(), PercentageSchema);

export const SkillsFileSchema = z.object({
  proficiencies: z.array(SkillProficiencySchema).min(1, 'Skills data should not be empty'),
  skillsByRole: z.record(z.string(), SkillWeightsSchema),
  skillsWithTools: z.record(z.string(), PercentageSchema)
});

// ============================================================================
// Connections
// ============================================================================

export const NodeCategorySchema = z.enum([
  'language',
  'competency',
  'data_tool',
  'viz_tool',
  'ml_tool',
  'infrastructure'
]);

export const ConnectionSchema = z.tuple([NonEmptyStringSchema, NonEmptyStringSchema]);

export const ConnectionsFileSchema = z.object({
  edges: z.array(ConnectionSchema).min(1, 'Tool connections should not be empty'),
  nodeCategories: z.record(z.string(), NodeCategorySchema),
  categoryColors: z.record(NodeCategorySchema, HexColorSchema),
  nodeSizes: z.record(z.string(), z.number().int().positive())
});

export type ExperienceFile = z.infer<typeof ExperienceFileSchema>;
export type SkillsFile = z.infer<typeof SkillsFileSchema>;
export type ConnectionsFile = z.infer<typeof ConnectionsFileSchema>;
