// SVG line charts for indicator tables — first column is the x label, every
// other numeric column becomes one series

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Table } from '@marketshell/market-data';

export interface ChartSeries {
  name: string;
  values: Array<number | null>;
}

export interface LineChart {
  title: string;
  labels: string[];
  series: ChartSeries[];
}

const PALETTE = ['#e5e7eb', '#f59e0b', '#3b82f6', '#10b981', '#ef4444', '#a855f7', '#14b8a6'];

const W = 960;
const H = 480;
const PAD = { top: 48, right: 16, bottom: 40, left: 72 };

export function chartFromTable(table: Table): LineChart {
  const labels = table.rows.map(row => String(row[0] ?? ''));
  const series: ChartSeries[] = [];
  table.columns.forEach((name, i) => {
    if (i === 0) return;
    const values = table.rows.map(row => {
      const v = row[i];
      return typeof v === 'number' ? v : null;
    });
    if (values.some(v => v !== null)) series.push({ name, values });
  });
  return { title: table.title, labels, series };
}

function escapeXml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

const round = (v: number) => Number(v.toFixed(2));

export function renderLineChartSvg(chart: LineChart): string {
  const all = chart.series.flatMap(s => s.values.filter((v): v is number => v !== null));
  const yMin = all.length > 0 ? Math.min(...all) : 0;
  const yMax = all.length > 0 ? Math.max(...all) : 1;
  const span = yMax - yMin || 1;
  const plotW = W - PAD.left - PAD.right;
  const plotH = H - PAD.top - PAD.bottom;
  const n = Math.max(1, chart.labels.length - 1);

  const x = (i: number) => round(PAD.left + (i * plotW) / n);
  const y = (v: number) => round(H - PAD.bottom - ((v - yMin) * plotH) / span);

  const lines = chart.series.map((s, si) => {
    const points = s.values.flatMap((v, i) => (v === null ? [] : [`${x(i)},${y(v)}`]));
    const color = PALETTE[si % PALETTE.length] ?? '#e5e7eb';
    return `<polyline fill="none" stroke="${color}" stroke-width="1.5" points="${points.join(' ')}"/>`;
  });

  const legend = chart.series.map((s, si) => {
    const color = PALETTE[si % PALETTE.length] ?? '#e5e7eb';
    return `<g transform="translate(${PAD.left + si * 140},${PAD.top - 14})"><rect width="10" height="10" y="-9" fill="${color}"/><text x="16" y="0">${escapeXml(s.name)}</text></g>`;
  });

  const ticks = [0, 0.25, 0.5, 0.75, 1].map(f => {
    const v = yMin + f * span;
    return `<text x="${PAD.left - 8}" y="${y(v)}" text-anchor="end" dominant-baseline="middle">${round(v).toLocaleString('en-US')}</text>`;
  });

  const step = Math.max(1, Math.ceil(chart.labels.length / 8));
  const xLabels = chart.labels.flatMap((label, i) =>
    i % step === 0 ? [`<text x="${x(i)}" y="${H - PAD.bottom + 16}" text-anchor="middle">${escapeXml(label)}</text>`] : [],
  );

  return [
    `<svg width="${W}" height="${H}" viewBox="0 0 ${W} ${H}" xmlns="http://www.w3.org/2000/svg" style="background-color:#1f2937;font-family:sans-serif;">`,
    `<text x="${W / 2}" y="20" text-anchor="middle" fill="#e5e7eb" font-size="14">${escapeXml(chart.title)}</text>`,
    `<g font-size="10" fill="#e5e7eb">${ticks.join('')}${xLabels.join('')}</g>`,
    `<g font-size="12" fill="#e5e7eb">${legend.join('')}</g>`,
    ...lines,
    '</svg>',
  ].join('\n') + '\n';
}

export async function writeChart(chart: LineChart, name: string, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, `${name}.svg`);
  await writeFile(path, renderLineChartSvg(chart), 'utf8');
  return path;
}
