/**
 * Skill Proficiency Radar
 */

import { SKILLS } from '../data';
import { getBand, skillLevelDescription } from '../domain/proficiency';
import { ProficiencyLevel } from '../types';
import type { SkillProficiency } from '../types';
import { chartTitle, FONT_FAMILY, GRID_COLOR, TITLE_COLOR } from './figure';
import type { Figure, ScatterPolarTrace } from './figure';
import { exportFigure } from './htmlExport';
import type { ChartOptions } from './options';

export const RADAR_FILE = 'radar.html';

const CONTEXT_PREVIEW_LENGTH = 80;

/**
 * Dotted rings at the upper edge of each band below Expert
 */
const REFERENCE_RINGS: readonly { level: ProficiencyLevel; color: string }[] = [
  { level: ProficiencyLevel.AWARENESS, color: 'rgba(255, 0, 0, 0.2)' },
  { level: ProficiencyLevel.APPLIED, color: 'rgba(255, 165, 0, 0.2)' },
  { level: ProficiencyLevel.PROFICIENT, color: 'rgba(0, 128, 0, 0.2)' }
];

export function radarHoverText(skill: SkillProficiency): string {
  let hover = `<b>${skill.name}</b><br>`;
  hover += `Score: ${skill.score}/100<br>`;
  hover += `Level: ${skillLevelDescription(skill)}<br>`;
  hover += `Experience: ${skill.yearsExperience} years<br>`;
  hover += `Last Used: ${skill.lastUsed}<br>`;
  hover += `<i>${skill.context.slice(0, CONTEXT_PREVIEW_LENGTH)}...</i>`;
  return hover;
}

export function buildRadarFigure(skills: readonly SkillProficiency[]): Figure {
  const names = skills.map(skill => skill.name);

  const proficiency: ScatterPolarTrace = {
    type: 'scatterpolar',
    name: 'Proficiency',
    r: skills.map(skill => skill.score),
    theta: names,
    fill: 'toself',
    fillcolor: 'rgba(138, 43, 226, 0.25)',
    line: { color: 'rgb(138, 43, 226)', width: 3 },
    marker: { size: 8, color: 'rgb(255, 140, 0)' },
    hovertemplate: '%{text}<extra></extra>',
    text: skills.map(radarHoverText)
  };

  const rings: ScatterPolarTrace[] = REFERENCE_RINGS.map(({ level, color }) => {
    const band = getBand(level);
    return {
      type: 'scatterpolar',
      name: `${band.label} (${band.maxScore})`,
      r: names.map(() => band.maxScore),
      theta: names,
      mode: 'lines',
      line: { color, width: 1, dash: 'dot' },
      hoverinfo: 'skip',
      showlegend: false
    };
  });

  return {
    data: [proficiency, ...rings],
    layout: {
      title: chartTitle('Technical Skill Proficiency', 24),
      polar: {
        radialaxis: {
          visible: true,
          range: [0, 100],
          tickmode: 'linear',
          tick0: 0,
          dtick: 20,
          tickfont: { size: 10, color: '#7F8C8D' },
          gridcolor: GRID_COLOR
        },
        angularaxis: {
          tickfont: { size: 12, color: TITLE_COLOR },
          gridcolor: GRID_COLOR
        },
        bgcolor: 'white'
      },
      paper_bgcolor: 'white',
      height: 600,
      width: 700,
      margin: { l: 100, r: 100, t: 100, b: 50 },
      showlegend: false,
      font: { family: FONT_FAMILY }
    }
  };
}

/**
 * Build the radar chart and write it to `radar.html`
 */
export async function createRadarChart(
  skills: readonly SkillProficiency[] = SKILLS,
  options: ChartOptions = {}
): Promise<Figure> {
  const figure = buildRadarFigure(skills);
  await exportFigure(figure, RADAR_FILE, options);
  return figure;
}
