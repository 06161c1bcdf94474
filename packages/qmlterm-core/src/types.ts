/**
 * Core types for qmlterm
 */

/**
 * One parsed markup element
 */
export interface MarkupNode {
  /** Tag name as written before the opening brace (never empty for parsed nodes) */
  kind: string;
  /** Value of the last `id` property assigned to this node */
  id?: string;
  /** Raw property text, keyed by property name */
  properties: Record<string, string>;
  /** Child elements in source order */
  children: MarkupNode[];
}

/**
 * Ordered top-level elements produced by one parse
 */
export interface MarkupDocument {
  roots: MarkupNode[];
}

/**
 * Character-grid output surface used by the render engine
 */
export interface Screen {
  clear(): void;
  drawText(row: number, col: number, text: string): void;
  refresh(): void;
  rows(): number;
  cols(): number;
}

/**
 * Maps a raw property value (a binding such as `greeter.message`) to display
 * text. An empty result means "use the raw value".
 */
export type BindingResolver = (binding: string) => string;

/**
 * Tag names the render engine recognises
 */
export interface RenderKinds {
  window: string;
  column: string;
  text: readonly string[];
  textField: string;
  button: string;
}

export interface RenderOptions {
  kinds?: Partial<RenderKinds>;
}

/**
 * Summary of a render pass
 */
export interface RenderResult {
  /** drawText calls issued, title included */
  drawn: number;
  /** True when column lines were dropped because the screen ran out of rows */
  truncated: boolean;
  /** Row cursor after the last drawn line */
  nextRow: number;
}
