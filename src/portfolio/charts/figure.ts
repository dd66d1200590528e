/**
 * Figure Types
 * 
 * The subset of the plotly.js figure format the portfolio charts emit.
 * A Figure serializes to JSON and is handed to Plotly.newPlot as-is.
 */

export interface Font {
  family?: string;
  size?: number;
  color?: string;
}

export interface Line {
  width?: number;
  color?: string;
  dash?: 'solid' | 'dot' | 'dash' | 'dashdot';
}

export interface Title {
  text: string;
  font?: Font;
  x?: number;
  xanchor?: 'left' | 'center' | 'right';
  side?: 'right' | 'top' | 'bottom';
}

interface TraceBase {
  name?: string;
  hovertemplate?: string;
  hoverinfo?: 'none' | 'skip' | 'text';
  showlegend?: boolean;
}

export interface BarTrace extends TraceBase {
  type: 'bar';
  orientation: 'h' | 'v';
  x: number[];
  y: number[];
  base: number;
  marker: { color: string; line?: Line };
  text: string;
  textposition: 'inside' | 'outside' | 'auto' | 'none';
  textfont?: Font;
  insidetextanchor?: 'start' | 'middle' | 'end';
}

export interface ScatterPolarTrace extends TraceBase {
  type: 'scatterpolar';
  r: number[];
  theta: string[];
  mode?: 'lines' | 'markers' | 'lines+markers';
  fill?: 'toself' | 'none';
  fillcolor?: string;
  line?: Line;
  marker?: { size: number; color: string };
  text?: string[];
}

export interface HeatmapTrace extends TraceBase {
  type: 'heatmap';
  z: (number | null)[][];
  x: string[];
  y: string[];
  colorscale: [number, string][];
  text: (number | null)[][];
  texttemplate: string;
  textfont?: Font;
  customdata: string[][];
  colorbar?: {
    title: Title;
    tickmode?: 'linear' | 'auto';
    tick0?: number;
    dtick?: number;
    thickness?: number;
    len?: number;
  };
}

interface HierarchyTraceBase extends TraceBase {
  labels: string[];
  parents: string[];
  values: number[];
  marker: { colors: string[]; line?: Line };
}

export interface TreemapTrace extends HierarchyTraceBase {
  type: 'treemap';
  text: string[];
  textposition: 'middle center' | 'top left';
  textfont?: Font;
  customdata: string[];
}

export interface SunburstTrace extends HierarchyTraceBase {
  type: 'sunburst';
  branchvalues: 'total' | 'remainder';
}

export interface ScatterTrace extends TraceBase {
  type: 'scatter';
  x: (number | null)[];
  y: (number | null)[];
  mode: 'lines' | 'markers' | 'markers+text';
  line?: Line;
  marker?: { size: number[]; color: string; line?: Line };
  text?: string[];
  textposition?: 'top center' | 'middle center';
  textfont?: Font;
  customdata?: string[];
}

export type Trace =
  | BarTrace
  | ScatterPolarTrace
  | HeatmapTrace
  | TreemapTrace
  | SunburstTrace
  | ScatterTrace;

export interface Axis {
  title?: Title;
  range?: [number, number];
  tickmode?: 'linear' | 'array' | 'auto';
  tick0?: number;
  dtick?: number;
  tickvals?: number[];
  ticktext?: string[];
  tickangle?: number;
  tickfont?: Font;
  gridcolor?: string;
  autorange?: boolean | 'reversed';
  side?: 'top' | 'bottom';
  showgrid?: boolean;
  zeroline?: boolean;
  showticklabels?: boolean;
}

export interface Shape {
  type: 'line';
  xref: 'x' | 'paper';
  yref: 'y' | 'paper';
  x0: number;
  x1: number;
  y0: number;
  y1: number;
  line: Line;
  opacity?: number;
}

export interface Annotation {
  text: string;
  x: number;
  y: number;
  xref: 'x' | 'paper';
  yref: 'y' | 'paper';
  showarrow: boolean;
  yanchor?: 'top' | 'middle' | 'bottom';
}

export interface Layout {
  title: Title;
  xaxis?: Axis;
  yaxis?: Axis;
  polar?: {
    radialaxis: Axis & { visible: boolean };
    angularaxis: Axis;
    bgcolor?: string;
  };
  legend?: {
    orientation: 'v' | 'h';
    x: number;
    y: number;
    xanchor: 'left' | 'center' | 'right';
    yanchor: 'top' | 'middle' | 'bottom';
    bgcolor?: string;
    bordercolor?: string;
    borderwidth?: number;
  };
  shapes?: Shape[];
  annotations?: Annotation[];
  plot_bgcolor?: string;
  paper_bgcolor?: string;
  width?: number;
  height?: number;
  margin?: { l: number; r: number; t: number; b: number };
  showlegend?: boolean;
  hovermode?: 'closest' | 'x' | 'y' | false;
  font?: Font;
}

export interface Figure {
  data: Trace[];
  layout: Layout;
}

/**
 * Shared look of every portfolio chart
 */
export const TITLE_COLOR = '#2C3E50';
export const GRID_COLOR = '#E8E8E8';
export const FONT_FAMILY = 'Arial, sans-serif';

export function chartTitle(text: string, size: number): Title {
  return {
    text,
    font: { size, color: TITLE_COLOR },
    x: 0.5,
    xanchor: 'center'
  };
}
