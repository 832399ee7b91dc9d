import type { LinearGradientFill, RibbonSurface, StrokeStyle } from "./surface.js";

export interface SvgDocumentOptions {
  width: number;
  height: number;
  background?: string;
}

const formatNumber = (value: number): string => String(Math.round(value * 1000) / 1000);

const escapeAttribute = (value: string): string =>
  value.replace(/&/g, "&amp;").replace(/"/g, "&quot;").replace(/</g, "&lt;");

/** Records surface operations as SVG markup. */
export class SvgSurface implements RibbonSurface {
  private segments: string[] = [];
  private readonly defs: string[] = [];
  private readonly elements: string[] = [];
  private gradientCount = 0;

  constructor(private readonly idPrefix = "ribbon") {}

  beginPath(): void {
    this.segments = [];
  }

  moveTo(x: number, y: number): void {
    this.segments.push(`M${formatNumber(x)} ${formatNumber(y)}`);
  }

  lineTo(x: number, y: number): void {
    this.segments.push(`L${formatNumber(x)} ${formatNumber(y)}`);
  }

  curveTo(cp1x: number, cp1y: number, cp2x: number, cp2y: number, x: number, y: number): void {
    const points = [cp1x, cp1y, cp2x, cp2y, x, y].map(formatNumber);
    this.segments.push(`C${points[0]} ${points[1]} ${points[2]} ${points[3]} ${points[4]} ${points[5]}`);
  }

  closePath(): void {
    this.segments.push("Z");
  }

  fillWithGradient(fill: LinearGradientFill): void {
    this.gradientCount += 1;
    const id = `${this.idPrefix}-gradient-${this.gradientCount}`;
    const stops = fill.stops.map(
      (stop) =>
        `<stop offset="${formatNumber(stop.offset)}" stop-color="${escapeAttribute(stop.color)}" stop-opacity="${formatNumber(stop.opacity)}"/>`,
    );
    this.defs.push(
      `<linearGradient id="${id}" gradientUnits="userSpaceOnUse" x1="${formatNumber(fill.x0)}" y1="${formatNumber(fill.y0)}" x2="${formatNumber(fill.x1)}" y2="${formatNumber(fill.y1)}">${stops.join("")}</linearGradient>`,
    );
    this.elements.push(`<path d="${this.pathData()}" fill="url(#${id})"/>`);
  }

  strokeWithStyle(style: StrokeStyle): void {
    this.elements.push(
      `<path d="${this.pathData()}" fill="none" stroke="${escapeAttribute(style.color)}" stroke-opacity="${formatNumber(style.opacity)}" stroke-width="${formatNumber(style.width)}" stroke-linecap="${style.lineCap}"/>`,
    );
  }

  get elementCount(): number {
    return this.elements.length;
  }

  toDocument(options: SvgDocumentOptions): string {
    const width = formatNumber(options.width);
    const height = formatNumber(options.height);
    const lines = [`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`];
    if (options.background) {
      lines.push(`<rect width="100%" height="100%" fill="${escapeAttribute(options.background)}"/>`);
    }
    if (this.defs.length > 0) {
      lines.push(`<defs>${this.defs.join("")}</defs>`);
    }
    lines.push(...this.elements, "</svg>");
    return `${lines.join("\n")}\n`;
  }

  private pathData(): string {
    return this.segments.join(" ");
  }
}
