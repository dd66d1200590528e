/**
 * Skills-by-Role Heatmap
 * 
 * Rows are roles, columns are skills; a cell is the share of the role's
 * effort spent on the skill, not proficiency.
 */

import { SKILLS_BY_ROLE } from '../data';
import type { SkillsByRole } from '../types';
import { chartTitle, FONT_FAMILY, TITLE_COLOR } from './figure';
import type { Figure } from './figure';
import { exportFigure } from './htmlExport';
import type { ChartOptions } from './options';

export const HEATMAP_FILE = 'heatmap.html';

export interface HeatmapMatrix {
  roles: string[];
  skills: string[];
  /** values[role][skill]; null where the role does not list the skill */
  values: (number | null)[][];
}

/**
 * Role rows in table order; skill columns in order of first appearance
 */
export function toHeatmapMatrix(skillsByRole: SkillsByRole): HeatmapMatrix {
  const roles = Object.keys(skillsByRole);
  const skills: string[] = [];
  for (const weights of Object.values(skillsByRole)) {
    for (const skill of Object.keys(weights)) {
      if (!skills.includes(skill)) {
        skills.push(skill);
      }
    }
  }

  const values = roles.map(role =>
    skills.map(skill => skillsByRole[role][skill] ?? null)
  );

  return { roles, skills, values };
}

export function involvementLabel(value: number): string {
  if (value >= 80) return 'Primary focus area';
  if (value >= 50) return 'Regular responsibility';
  if (value >= 20) return 'Occasional work';
  return 'Minimal involvement';
}

export function heatmapHoverText(role: string, skill: string, value: number | null): string {
  let hover = `<b>${role}</b><br>`;
  hover += `Skill: ${skill}<br>`;
  if (value === null) {
    return hover + 'Responsibility: not recorded';
  }
  hover += `Responsibility: ${value}%<br>`;
  hover += `<i>${involvementLabel(value)}</i>`;
  return hover;
}

export function buildHeatmapFigure(skillsByRole: SkillsByRole): Figure {
  const { roles, skills, values } = toHeatmapMatrix(skillsByRole);

  const hoverTexts = roles.map((role, row) =>
    skills.map((skill, column) => heatmapHoverText(role, skill, values[row][column]))
  );

  return {
    data: [
      {
        type: 'heatmap',
        z: values,
        x: skills,
        y: roles,
        colorscale: [
          [0.0, '#F8F9FA'],
          [0.2, '#E3D5F5'],
          [0.4, '#C7ABE8'],
          [0.6, '#AB81DB'],
          [0.8, '#8F57CE'],
          [1.0, '#732DC1']
        ],
        text: values,
        texttemplate: '%{text}',
        textfont: { size: 11, color: 'white' },
        hovertemplate: '%{customdata}<extra></extra>',
        customdata: hoverTexts,
        colorbar: {
          title: { text: 'Responsibility<br>Weight (%)', side: 'right' },
          tickmode: 'linear',
          tick0: 0,
          dtick: 20,
          thickness: 20,
          len: 0.7
        }
      }
    ],
    layout: {
      title: chartTitle(
        'Skills Usage Across Roles<br><sub>Percentage represents responsibility weight, not proficiency level</sub>',
        22
      ),
      xaxis: {
        title: { text: 'Skills & Competencies' },
        side: 'bottom',
        tickangle: -45,
        tickfont: { size: 12, color: TITLE_COLOR }
      },
      yaxis: {
        title: { text: 'Professional Roles' },
        tickfont: { size: 12, color: TITLE_COLOR },
        // oldest role at the top
        autorange: 'reversed'
      },
      plot_bgcolor: 'white',
      paper_bgcolor: 'white',
      height: 500,
      width: 900,
      margin: { l: 180, r: 120, t: 120, b: 120 },
      font: { family: FONT_FAMILY }
    }
  };
}

/**
 * Build the heatmap and write it to `heatmap.html`
 */
export async function createHeatmap(
  skillsByRole: SkillsByRole = SKILLS_BY_ROLE,
  options: ChartOptions = {}
): Promise<Figure> {
  const figure = buildHeatmapFigure(skillsByRole);
  await exportFigure(figure, HEATMAP_FILE, options);
  return figure;
}
