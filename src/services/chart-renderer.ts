import * as echarts from 'echarts';
import type { EChartsOption } from 'echarts';
import sharp from 'sharp';
import { ChartSpec } from '../types/schemas';
import { ChartKind, isPartToWholeKind } from '../utils/chart-types';

export interface ChartRendererOptions {
  width?: number;
  height?: number;
  background?: string;
  palette?: string[];
}

export interface RenderedChart {
  svg: string;
  png: Buffer;
  width: number;
  height: number;
}

export const DEFAULT_PALETTE = [
  '#5470c6', '#91cc75', '#fac858', '#ee6666',
  '#73c0de', '#3ba272', '#fc8452', '#9a60b4'
];

/**
 * Turns a validated chart spec into an image. ECharts renders server-side to
 * SVG; sharp rasterizes the SVG to PNG.
 */
export class ChartRenderer {
  readonly width: number;
  readonly height: number;
  private readonly background: string;
  private readonly palette: string[];

  constructor(options: ChartRendererOptions = {}) {
    this.width = options.width ?? 800;
    this.height = options.height ?? 600;
    this.background = options.background ?? '#ffffff';
    this.palette = options.palette ?? DEFAULT_PALETTE;
  }

  buildOption(spec: ChartSpec, kind: ChartKind): EChartsOption {
    const base: EChartsOption = {
      animation: false,
      backgroundColor: this.background,
      color: this.palette,
      textStyle: { fontFamily: 'sans-serif' },
      title: { text: spec.title, left: 'center', top: 10 }
    };

    const showLegend = spec.series.length > 1 || isPartToWholeKind(kind);
    const legend: EChartsOption['legend'] = showLegend ? { bottom: 10, type: 'plain' } : { show: false };

    switch (kind) {
      case 'pie':
      case 'donut': {
        const series = spec.series[0];
        return {
          ...base,
          legend,
          series: [{
            type: 'pie' as const,
            name: series.name,
            radius: kind === 'donut' ? ['40%', '65%'] : '60%',
            center: ['50%', '52%'],
            label: { show: true, formatter: '{b}: {d}%' },
            data: spec.categories.map((category, index) => ({ name: category, value: series.values[index] }))
          }]
        };
      }

      case 'scatter':
        return {
          ...base,
          legend,
          grid: this.grid(showLegend),
          xAxis: { type: 'value', name: spec.x_axis_label, nameLocation: 'middle', nameGap: 30, scale: true },
          yAxis: { type: 'value', name: spec.y_axis_label, scale: true },
          series: spec.series.map(series => ({
            type: 'scatter' as const,
            name: series.name,
            symbolSize: 10,
            data: spec.categories.map((category, index) => [Number(category), series.values[index]])
          }))
        };

      case 'horizontal-bar':
        return {
          ...base,
          legend,
          grid: this.grid(showLegend),
          xAxis: { type: 'value', name: spec.y_axis_label, nameLocation: 'middle', nameGap: 30 },
          yAxis: { type: 'category', name: spec.x_axis_label, data: spec.categories, inverse: true },
          series: spec.series.map(series => ({ type: 'bar' as const, name: series.name, data: series.values }))
        };

      case 'bar':
      case 'stacked-bar':
      case 'line':
      case 'area':
        return {
          ...base,
          legend,
          grid: this.grid(showLegend),
          xAxis: {
            type: 'category',
            name: spec.x_axis_label,
            nameLocation: 'middle',
            nameGap: 30,
            data: spec.categories,
            boundaryGap: kind === 'bar' || kind === 'stacked-bar'
          },
          yAxis: { type: 'value', name: spec.y_axis_label },
          series: spec.series.map(series =>
            kind === 'bar' || kind === 'stacked-bar'
              ? {
                  type: 'bar' as const,
                  name: series.name,
                  data: series.values,
                  ...(kind === 'stacked-bar' ? { stack: 'total' } : {})
                }
              : {
                  type: 'line' as const,
                  name: series.name,
                  data: series.values,
                  ...(kind === 'area' ? { areaStyle: {} } : {})
                }
          )
        };
    }
  }

  renderSvg(spec: ChartSpec, kind: ChartKind): string {
    const chart = echarts.init(null, null, {
      renderer: 'svg',
      ssr: true,
      width: this.width,
      height: this.height
    });

    try {
      chart.setOption(this.buildOption(spec, kind));
      return chart.renderToSVGString();
    } finally {
      chart.dispose();
    }
  }

  async render(spec: ChartSpec, kind: ChartKind): Promise<RenderedChart> {
    const svg = this.renderSvg(spec, kind);
    const png = await sharp(Buffer.from(svg, 'utf8')).png().toBuffer();

    return { svg, png, width: this.width, height: this.height };
  }

  private grid(withLegend: boolean): EChartsOption['grid'] {
    return { left: 70, right: 40, top: 60, bottom: withLegend ? 80 : 60, containLabel: true };
  }
}
