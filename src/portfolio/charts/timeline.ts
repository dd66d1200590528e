/**
 * Experience Timeline
 * 
 * Horizontal bars, one row per role, from start year to end year (or the
 * current year for the ongoing role).
 */

import { EXPERIENCE } from '../data';
import { effectiveEndYear, formatRolePeriod, roleDuration } from '../domain/experience';
import { chartTitle, FONT_FAMILY, GRID_COLOR } from './figure';
import type { BarTrace, Figure } from './figure';
import { exportFigure } from './htmlExport';
import { currentYearOf } from './options';
import type { ChartOptions } from './options';
import type { Role } from '../types';

export const TIMELINE_FILE = 'timeline.html';

/** Ongoing roles that started this year still get a visible bar */
const MIN_BAR_WIDTH = 0.5;
const HOVER_RESPONSIBILITIES = 3;

export function timelineHoverText(role: Role, currentYear: number): string {
  let hover = `<b>${role.company}</b><br>`;
  hover += `${role.title}<br>`;
  hover += `${formatRolePeriod(role)}<br>`;
  hover += `Duration: ${roleDuration(role, currentYear)} years<br><br>`;
  hover += '<b>Key Responsibilities:</b><br>';
  for (const responsibility of role.responsibilities.slice(0, HOVER_RESPONSIBILITIES)) {
    hover += `• ${responsibility}<br>`;
  }
  return hover;
}

export function buildTimelineFigure(roles: readonly Role[], currentYear: number): Figure {
  const data: BarTrace[] = roles.map((role, index) => ({
    type: 'bar',
    name: role.company,
    orientation: 'h',
    x: [Math.max(effectiveEndYear(role, currentYear) - role.startYear, MIN_BAR_WIDTH)],
    y: [index],
    base: role.startYear,
    marker: { color: role.color, line: { color: 'white', width: 1 } },
    hovertemplate: `${timelineHoverText(role, currentYear)}<extra></extra>`,
    text: role.title,
    textposition: 'inside',
    textfont: { color: 'white', size: 11 },
    insidetextanchor: 'middle'
  }));

  return {
    data,
    layout: {
      title: chartTitle('Professional Experience Timeline', 24),
      xaxis: {
        title: { text: 'Year' },
        range: [2005, currentYear + 1],
        tickmode: 'linear',
        tick0: 2006,
        dtick: 2,
        gridcolor: GRID_COLOR
      },
      yaxis: {
        title: { text: '' },
        tickmode: 'array',
        ticktext: roles.map(role => role.company),
        tickvals: roles.map((_, index) => index),
        autorange: 'reversed'
      },
      shapes: [
        {
          type: 'line',
          xref: 'x',
          yref: 'paper',
          x0: currentYear,
          x1: currentYear,
          y0: 0,
          y1: 1,
          line: { color: 'gray', dash: 'dash' },
          opacity: 0.5
        }
      ],
      annotations: [
        {
          text: `Today (${currentYear})`,
          x: currentYear,
          y: 1,
          xref: 'x',
          yref: 'paper',
          showarrow: false,
          yanchor: 'bottom'
        }
      ],
      plot_bgcolor: 'white',
      paper_bgcolor: 'white',
      height: 500,
      margin: { l: 150, r: 50, t: 80, b: 80 },
      showlegend: false,
      hovermode: 'closest',
      font: { family: FONT_FAMILY, size: 12, color: '#34495E' }
    }
  };
}

/**
 * Build the timeline and write it to `timeline.html`
 */
export async function createTimeline(
  roles: readonly Role[] = EXPERIENCE,
  options: ChartOptions = {}
): Promise<Figure> {
  const figure = buildTimelineFigure(roles, currentYearOf(options));
  await exportFigure(figure, TIMELINE_FILE, options);
  return figure;
}
