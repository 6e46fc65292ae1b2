import { Point } from './dashboard-layout.js';

export type TextAnchor = 'start' | 'middle' | 'end';

export interface RectStyle {
  fill?: string;
  stroke?: string;
  strokeWidth?: number;
  opacity?: number;
}

export interface LineStyle {
  stroke: string;
  strokeWidth: number;
  opacity?: number;
}

export interface TextStyle {
  fill: string;
  fontSize: number;
  anchor?: TextAnchor;
  bold?: boolean;
  opacity?: number;
  rotate?: number;
}

/** The plotting primitives the dashboard renderer draws with. */
export interface DrawingSurface {
  readonly width: number;
  readonly height: number;
  drawRect(x: number, y: number, width: number, height: number, style: RectStyle): void;
  drawLine(from: Point, to: Point, style: LineStyle): void;
  drawPolyline(points: readonly Point[], style: LineStyle): void;
  drawText(x: number, y: number, text: string, style: TextStyle): void;
}

const escapeXml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');

const fmt = (value: number): string => String(Math.round(value * 100) / 100);

const opacityAttr = (opacity: number | undefined): string => (opacity === undefined ? '' : ` opacity="${fmt(opacity)}"`);

export class SvgSurface implements DrawingSurface {
  private readonly elements: string[] = [];

  constructor(readonly width: number, readonly height: number, private readonly background: string = '#ffffff') {}

  drawRect(x: number, y: number, width: number, height: number, style: RectStyle): void {
    const stroke = style.stroke ? ` stroke="${style.stroke}" stroke-width="${fmt(style.strokeWidth ?? 1)}"` : '';
    this.elements.push(
      `<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(width)}" height="${fmt(height)}" fill="${style.fill ?? 'none'}"${stroke}${opacityAttr(style.opacity)}/>`,
    );
  }

  drawLine(from: Point, to: Point, style: LineStyle): void {
    this.elements.push(
      `<line x1="${fmt(from[0])}" y1="${fmt(from[1])}" x2="${fmt(to[0])}" y2="${fmt(to[1])}" stroke="${style.stroke}" stroke-width="${fmt(style.strokeWidth)}"${opacityAttr(style.opacity)}/>`,
    );
  }

  drawPolyline(points: readonly Point[], style: LineStyle): void {
    if (!points.length) {
      return;
    }
    const coords = points.map(([x, y]) => `${fmt(x)},${fmt(y)}`).join(' ');
    this.elements.push(
      `<polyline points="${coords}" fill="none" stroke="${style.stroke}" stroke-width="${fmt(style.strokeWidth)}"${opacityAttr(style.opacity)}/>`,
    );
  }

  drawText(x: number, y: number, text: string, style: TextStyle): void {
    const weight = style.bold ? ' font-weight="bold"' : '';
    const rotate = style.rotate ? ` transform="rotate(${fmt(style.rotate)} ${fmt(x)} ${fmt(y)})"` : '';
    this.elements.push(
      `<text x="${fmt(x)}" y="${fmt(y)}" fill="${style.fill}" font-size="${fmt(style.fontSize)}" text-anchor="${style.anchor ?? 'start'}"${weight}${opacityAttr(style.opacity)}${rotate}>${escapeXml(text)}</text>`,
    );
  }

  toSvg(): string {
    return [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${this.width}" height="${this.height}" viewBox="0 0 ${this.width} ${this.height}" font-family="DejaVu Sans, Arial, sans-serif">`,
      `<rect x="0" y="0" width="${this.width}" height="${this.height}" fill="${this.background}"/>`,
      ...this.elements,
      '</svg>',
    ].join('\n');
  }
}
