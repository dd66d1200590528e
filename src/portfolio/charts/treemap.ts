/**
 * Skills & Tools Treemap and Sunburst
 * 
 * Both group the skills-with-tools scores under their network category.
 * The treemap stands in for a word cloud: size still shows relative weight
 * but every label stays readable and hoverable.
 */

import { CONNECTION_GRAPH, SKILLS_WITH_TOOLS } from '../data';
import { nodeCategory, nodeColor, titleCase } from '../domain/connections';
import type { ConnectionGraphData, NodeCategory, SkillScores } from '../types';
import { chartTitle, FONT_FAMILY } from './figure';
import type { Figure } from './figure';
import { exportFigure } from './htmlExport';
import type { ChartOptions } from './options';

export const TREEMAP_FILE = 'wordcloud.html';
export const SUNBURST_FILE = 'wordcloud_sunburst.html';

const TREEMAP_CATEGORY_NAMES: Readonly<Record<NodeCategory, string>> = {
  language: 'Programming Languages',
  competency: 'Core Competencies',
  data_tool: 'Data Tools',
  viz_tool: 'Visualization Tools',
  ml_tool: 'ML/AI Tools',
  infrastructure: 'Infrastructure & Orchestration'
};

const SUNBURST_CATEGORY_NAMES: Readonly<Record<NodeCategory, string>> = {
  language: 'Languages',
  competency: 'Competencies',
  data_tool: 'Data Tools',
  viz_tool: 'Viz Tools',
  ml_tool: 'ML/AI',
  infrastructure: 'Infrastructure'
};

export interface CategoryGroup {
  category: NodeCategory;
  items: [name: string, score: number][];
  total: number;
}

/**
 * Skills grouped by category, categories in order of first appearance
 */
export function groupByCategory(scores: SkillScores, graph: ConnectionGraphData): CategoryGroup[] {
  const groups = new Map<NodeCategory, CategoryGroup>();
  for (const [name, score] of Object.entries(scores)) {
    const category = nodeCategory(graph, name);
    let group = groups.get(category);
    if (!group) {
      group = { category, items: [], total: 0 };
      groups.set(category, group);
    }
    group.items.push([name, score]);
    group.total += score;
  }
  return [...groups.values()];
}

function sumScores(scores: SkillScores): number {
  return Object.values(scores).reduce((total, score) => total + score, 0);
}

interface Hierarchy {
  labels: string[];
  parents: string[];
  values: number[];
  colors: string[];
  hoverTexts: string[];
}

function buildHierarchy(
  scores: SkillScores,
  graph: ConnectionGraphData,
  root: { label: string; hover: string; value: number },
  categoryNames: Readonly<Record<NodeCategory, string>>
): Hierarchy {
  const hierarchy: Hierarchy = {
    labels: [root.label],
    parents: [''],
    values: [root.value],
    colors: ['#FFFFFF'],
    hoverTexts: [root.hover]
  };

  for (const group of groupByCategory(scores, graph)) {
    const categoryName = categoryNames[group.category] ?? titleCase(group.category);
    hierarchy.labels.push(categoryName);
    hierarchy.parents.push(root.label);
    hierarchy.values.push(group.total);
    hierarchy.colors.push(nodeColor(graph, group.items[0][0]));
    hierarchy.hoverTexts.push(`${categoryName}<br>Total Proficiency: ${group.total}`);

    for (const [name, score] of group.items) {
      hierarchy.labels.push(name);
      hierarchy.parents.push(categoryName);
      hierarchy.values.push(score);
      hierarchy.colors.push(nodeColor(graph, name));
      hierarchy.hoverTexts.push(
        `<b>${name}</b><br>Proficiency: ${score}/100<br>Category: ${categoryName}`
      );
    }
  }

  return hierarchy;
}

export function buildTreemapFigure(
  scores: SkillScores,
  graph: ConnectionGraphData = CONNECTION_GRAPH
): Figure {
  const hierarchy = buildHierarchy(
    scores,
    graph,
    // "remainder" branch values: plotly sums the children
    { label: 'All Skills', hover: 'All Technical Skills & Tools', value: 0 },
    TREEMAP_CATEGORY_NAMES
  );

  return {
    data: [
      {
        type: 'treemap',
        labels: hierarchy.labels,
        parents: hierarchy.parents,
        values: hierarchy.values,
        marker: { colors: hierarchy.colors, line: { width: 2, color: 'white' } },
        text: hierarchy.labels,
        textposition: 'middle center',
        hovertemplate: '%{customdata}<extra></extra>',
        customdata: hierarchy.hoverTexts,
        textfont: { size: 14, color: 'white', family: 'Arial Black, sans-serif' }
      }
    ],
    layout: {
      title: chartTitle(
        'Skills & Tools Portfolio<br><sub>Interactive treemap showing proficiency across technologies</sub>',
        22
      ),
      paper_bgcolor: 'white',
      height: 600,
      width: 900,
      margin: { l: 20, r: 20, t: 100, b: 20 },
      font: { family: FONT_FAMILY }
    }
  };
}

export function buildSunburstFigure(
  scores: SkillScores,
  graph: ConnectionGraphData = CONNECTION_GRAPH
): Figure {
  const hierarchy = buildHierarchy(
    scores,
    graph,
    // "total" branch values: the root must hold the sum of its children
    { label: 'Skills', hover: 'Skills', value: sumScores(scores) },
    SUNBURST_CATEGORY_NAMES
  );

  return {
    data: [
      {
        type: 'sunburst',
        labels: hierarchy.labels,
        parents: hierarchy.parents,
        values: hierarchy.values,
        marker: { colors: hierarchy.colors, line: { width: 2, color: 'white' } },
        branchvalues: 'total'
      }
    ],
    layout: {
      title: { text: 'Skills & Tools Portfolio (Sunburst)' },
      height: 600,
      width: 600,
      paper_bgcolor: 'white'
    }
  };
}

export interface HierarchyChartOptions extends ChartOptions {
  /** Category lookups; defaults to the built-in connection graph */
  graph?: ConnectionGraphData;
}

/**
 * Build the treemap and write it to `wordcloud.html`
 */
export async function createTreemap(
  scores: SkillScores = SKILLS_WITH_TOOLS,
  options: HierarchyChartOptions = {}
): Promise<Figure> {
  const figure = buildTreemapFigure(scores, options.graph);
  await exportFigure(figure, TREEMAP_FILE, options);
  return figure;
}

/**
 * Build the sunburst and write it to `wordcloud_sunburst.html`
 */
export async function createSunburst(
  scores: SkillScores = SKILLS_WITH_TOOLS,
  options: HierarchyChartOptions = {}
): Promise<Figure> {
  const figure = buildSunburstFigure(scores, options.graph);
  await exportFigure(figure, SUNBURST_FILE, options);
  return figure;
}
