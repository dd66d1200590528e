/**
 * Experience helpers
 */

import type { Role } from '../types';

/**
 * Whether the role is ongoing
 */
export function isCurrentRole(role: Role): boolean {
  return role.endYear === null;
}

/**
 * Length of a role in years; an ongoing role runs until `currentYear`
 */
export function roleDuration(role: Role, currentYear: number): number {
  const end = role.endYear ?? currentYear;
  return end - role.startYear;
}

/**
 * Last year a role covers, `currentYear` for an ongoing one
 */
export function effectiveEndYear(role: Role, currentYear: number): number {
  return role.endYear ?? currentYear;
}

/**
 * "2018 - 2021" or "2025 - Present"
 */
export function formatRolePeriod(role: Role): string {
  return `${role.startYear} - ${role.endYear === null ? 'Present' : role.endYear}`;
}

/**
 * Years between the first start and the last (effective) end
 */
export function careerSpan(roles: readonly Role[], currentYear: number): number {
  if (roles.length === 0) {
    return 0;
  }
  const earliest = Math.min(...roles.map(role => role.startYear));
  const latest = Math.max(...roles.map(role => effectiveEndYear(role, currentYear)));
  return latest - earliest;
}
