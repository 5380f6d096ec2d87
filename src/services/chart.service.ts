import sharp from 'sharp';
import { writeFileAtomic } from '../utils';
import type { ContributionMap } from './types';

interface ChartLayout {
  width: number;
  height: number;
  marginTop: number;
  marginRight: number;
  marginBottom: number;
  marginLeft: number;
}

const escapeXml = (value: string) =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

export class ChartService {
  private static readonly LAYOUT: ChartLayout = {
    width: 1200,
    height: 600,
    marginTop: 60,
    marginRight: 30,
    marginBottom: 110,
    marginLeft: 80,
  };

  private static readonly MAX_X_LABELS = 30;
  private static readonly Y_TICKS = 5;

  static readonly TITLE = 'GitHub Contributions Over Time';

  /** Rounds the axis maximum up to a multiple of the tick count. */
  static axisMax(maxValue: number): number {
    const step = Math.max(1, Math.ceil(maxValue / this.Y_TICKS));
    return step * this.Y_TICKS;
  }

  static buildChartSvg(dailyTotals: ContributionMap, title: string = ChartService.TITLE): string {
    const { width, height, marginTop, marginRight, marginBottom, marginLeft } = this.LAYOUT;
    const plotWidth = width - marginLeft - marginRight;
    const plotHeight = height - marginTop - marginBottom;
    const entries = Object.entries(dailyTotals).sort(([a], [b]) => a.localeCompare(b));
    const yMax = this.axisMax(entries.reduce((max, [, count]) => Math.max(max, count), 0));

    const gridLines = Array.from({ length: this.Y_TICKS + 1 }, (_, i) => {
      const value = (yMax / this.Y_TICKS) * i;
      const y = marginTop + plotHeight - (value / yMax) * plotHeight;
      return `
      <line x1="${marginLeft}" y1="${y}" x2="${marginLeft + plotWidth}" y2="${y}" class="grid"/>
      <text x="${marginLeft - 10}" y="${y + 4}" class="tick" text-anchor="end">${value}</text>`;
    }).join('');

    const slot = entries.length > 0 ? plotWidth / entries.length : plotWidth;
    const barWidth = Math.max(1, slot * 0.8);
    const labelEvery = Math.max(1, Math.ceil(entries.length / this.MAX_X_LABELS));

    const bars = entries
      .map(([date, count], index) => {
        const x = marginLeft + index * slot + (slot - barWidth) / 2;
        const barHeight = (count / yMax) * plotHeight;
        const y = marginTop + plotHeight - barHeight;
        const bar = `<rect x="${x}" y="${y}" width="${barWidth}" height="${barHeight}" class="bar"/>`;
        if (index % labelEvery !== 0) return bar;
        const labelX = x + barWidth / 2;
        const labelY = marginTop + plotHeight + 14;
        return `${bar}
      <text x="${labelX}" y="${labelY}" class="tick" text-anchor="end" transform="rotate(-45 ${labelX} ${labelY})">${escapeXml(date)}</text>`;
      })
      .join('\n      ');

    const emptyNotice =
      entries.length === 0
        ? `<text x="${marginLeft + plotWidth / 2}" y="${marginTop + plotHeight / 2}" class="notice" text-anchor="middle">No contributions</text>`
        : '';

    return `
    <svg width="${width}" height="${height}" viewBox="0 0 ${width} ${height}"
      xmlns="http://www.w3.org/2000/svg">
      <style>
        .title { font: 600 22px sans-serif; fill: #111827; }
        .axis-label { font: 500 14px sans-serif; fill: #374151; }
        .tick { font: 400 11px sans-serif; fill: #4B5563; }
        .notice { font: 500 18px sans-serif; fill: #9CA3AF; }
        .grid { stroke: #E5E7EB; stroke-width: 1; }
        .bar { fill: #1F77B4; fill-opacity: 0.7; }
      </style>

      <rect x="0" y="0" width="${width}" height="${height}" fill="#FFFFFF"/>
      <text x="${width / 2}" y="36" class="title" text-anchor="middle">${escapeXml(title)}</text>
      ${gridLines}
      ${bars}
      ${emptyNotice}
      <line x1="${marginLeft}" y1="${marginTop + plotHeight}" x2="${marginLeft + plotWidth}" y2="${marginTop + plotHeight}" stroke="#111827"/>
      <text x="${marginLeft + plotWidth / 2}" y="${height - 12}" class="axis-label" text-anchor="middle">Date</text>
      <text x="20" y="${marginTop + plotHeight / 2}" class="axis-label" text-anchor="middle"
        transform="rotate(-90 20 ${marginTop + plotHeight / 2})">Number of Contributions</text>
    </svg>`.trim();
  }

  /** Rasterizes the daily totals chart to a PNG at `outputPath`. */
  static async renderChart(dailyTotals: ContributionMap, outputPath: string): Promise<string> {
    const svg = this.buildChartSvg(dailyTotals);
    const png = await sharp(Buffer.from(svg)).png().toBuffer();
    await writeFileAtomic(outputPath, png);
    return outputPath;
  }
}
