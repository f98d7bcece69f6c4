/**
 * Render plan: everything the renderer paints for one frame, already resolved
 * to canvas pixels. Produced by the layout engine, consumed by the renderer.
 */

export type TextAlign = 'left' | 'center' | 'right';
export type TextBaseline = 'middle' | 'bottom';
export type FontWeight = 'normal' | 'bold';

export interface TextPlacement {
  text: string;
  x: number;
  y: number;
  align: TextAlign;
  baseline: TextBaseline;
  color: string;
  /** Pixels */
  fontSize: number;
  weight: FontWeight;
  alpha: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface GridlinePlacement {
  /** Axis value the line marks */
  value: number;
  x: number;
  top: number;
  bottom: number;
  color: string;
  alpha: number;
  label: TextPlacement;
}

export interface BarPlacement {
  series: string;
  value: number;
  /** Eased slot the bar was placed at */
  slot: number;
  rect: Rect;
  radius: number;
  color: string;
  /** Present only when the bar is long enough to carry one */
  highlight: (Rect & { color: string; alpha: number }) | null;
  name: TextPlacement;
  valueLabel: TextPlacement;
}

export interface LogoPlacement {
  /** Left edge */
  x: number;
  /** Bottom edge; the logo grows upward from here */
  bottom: number;
}

export interface RenderPlan {
  width: number;
  height: number;
  background: string;
  axisMax: number;
  gridStep: number;
  gridlines: GridlinePlacement[];
  bars: BarPlacement[];
  title: TextPlacement;
  timestamp: TextPlacement;
  attribution: TextPlacement;
  logo: LogoPlacement;
}
