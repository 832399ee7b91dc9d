export type LineCap = "butt" | "round" | "square";

export interface GradientStop {
  offset: number;
  color: string;
  opacity: number;
}

export interface LinearGradientFill {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  stops: GradientStop[];
}

export interface StrokeStyle {
  color: string;
  opacity: number;
  width: number;
  lineCap: LineCap;
}

/**
 * Immediate-mode 2D target the ribbons are painted into. Fill and stroke
 * consume the path built since the last `beginPath`.
 */
export interface RibbonSurface {
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  curveTo(cp1x: number, cp1y: number, cp2x: number, cp2y: number, x: number, y: number): void;
  closePath(): void;
  fillWithGradient(fill: LinearGradientFill): void;
  strokeWithStyle(style: StrokeStyle): void;
}

export type PathCommand =
  | { op: "move"; x: number; y: number }
  | { op: "line"; x: number; y: number }
  | { op: "curve"; cp1x: number; cp1y: number; cp2x: number; cp2y: number; x: number; y: number }
  | { op: "close" };

export const tracePath = (surface: RibbonSurface, commands: PathCommand[]): void => {
  surface.beginPath();
  for (const command of commands) {
    switch (command.op) {
      case "move":
        surface.moveTo(command.x, command.y);
        break;
      case "line":
        surface.lineTo(command.x, command.y);
        break;
      case "curve":
        surface.curveTo(command.cp1x, command.cp1y, command.cp2x, command.cp2y, command.x, command.y);
        break;
      case "close":
        surface.closePath();
        break;
    }
  }
};
