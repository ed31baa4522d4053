// src/render/terminalChart.ts
import type { MetricView } from 'App/stats/StatAggregator';

const ESC = '\u001b[';
const CLEAR_SCREEN = `${ESC}2J${ESC}H`;

type Style = 'bold' | 'underline' | 'purple' | 'white' | 'green' | 'red';

const STYLE_CODES: Record<Style, number> = {
  bold: 1,
  underline: 4,
  purple: 95,
  white: 37,
  green: 32,
  red: 31,
};

export interface ChartOptions {
  /** Rows of the plot area. */
  height: number;
  /** ANSI styling of the caption; off for pipes and tests. */
  colors: boolean;
}

const paint = (text: string, styles: Style[], colors: boolean): string =>
  colors
    ? `${ESC}${styles.map(s => STYLE_CODES[s]).join(';')}m${text}${ESC}0m`
    : text;

/** `[Label: x] [LAST: n] [AVG: n] [MIN: n] [MAX: n]`, values to two decimals. */
export function formatCaption(view: MetricView, colors: boolean): string {
  const s = view.summary;
  const fmt = (n: number | undefined) => (n === undefined ? '-' : n.toFixed(2));
  return [
    `[Label: ${paint(view.label, ['bold'], colors)}]`,
    `[LAST: ${paint(fmt(s?.last), ['purple', 'underline'], colors)}]`,
    `[AVG: ${paint(fmt(s?.avg), ['white', 'bold'], colors)}]`,
    `[MIN: ${paint(fmt(s?.min), ['green', 'bold'], colors)}]`,
    `[MAX: ${paint(fmt(s?.max), ['red', 'bold'], colors)}]`,
  ].join(' ');
}

/**
 * Line chart with a labelled y axis, one column per value.
 * Returns an empty string for an empty series.
 */
export function plot(values: readonly number[], height: number): string {
  if (values.length === 0) return '';

  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const range = max - min;
  const ratio = range !== 0 ? height / range : 1;
  const min2 = Math.round(min * ratio);
  const max2 = Math.round(max * ratio);
  const rows = max2 - min2;

  const labels: string[] = [];
  for (let y = 0; y <= rows; y++) {
    const value = rows > 0 ? max - (y * range) / rows : max;
    labels.push(value.toFixed(2));
  }
  const labelWidth = Math.max(...labels.map(l => l.length));
  const offset = labelWidth + 2;

  const grid: string[][] = [];
  for (let y = 0; y <= rows; y++) {
    const row = new Array<string>(offset + values.length).fill(' ');
    const label = labels[y].padStart(labelWidth);
    for (let i = 0; i < label.length; i++) row[i] = label[i];
    row[offset - 1] = '┤';
    grid.push(row);
  }

  const level = (v: number) => Math.round(v * ratio) - min2;
  grid[rows - level(values[0])][offset - 1] = '┼';

  for (let x = 0; x < values.length - 1; x++) {
    const y0 = level(values[x]);
    const y1 = level(values[x + 1]);
    const col = x + offset;
    if (y0 === y1) {
      grid[rows - y0][col] = '─';
      continue;
    }
    grid[rows - y1][col] = y0 > y1 ? '╰' : '╭';
    grid[rows - y0][col] = y0 > y1 ? '╮' : '╯';
    const from = Math.min(y0, y1) + 1;
    const to = Math.max(y0, y1);
    for (let y = from; y < to; y++) grid[rows - y][col] = '│';
  }

  return grid.map(row => row.join('').trimEnd()).join('\n');
}

/** Caption plus plot for every metric that has at least one point. */
export function renderDashboard(
  views: readonly MetricView[],
  options: ChartOptions,
): string {
  return views
    .filter(v => v.history.length > 0)
    .map(v => `${formatCaption(v, options.colors)}\n${plot(v.history, options.height)}\n`)
    .join('\n');
}

/** Redraws the whole dashboard on every call. */
export class TerminalRenderer {
  constructor(
    private readonly out: NodeJS.WritableStream,
    private readonly options: ChartOptions,
  ) {}

  render(views: readonly MetricView[]) {
    this.out.write(CLEAR_SCREEN + renderDashboard(views, this.options));
  }
}
