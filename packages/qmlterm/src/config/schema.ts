/**
 * Configuration schema for qmlterm
 */

import { z } from "zod";

export const rendererSchema = z.enum(["cli", "tui"]);

export type RendererMode = z.infer<typeof rendererSchema>;

/**
 * Grid size for the cli renderer (the tui renderer uses the terminal size)
 */
export const screenSizeSchema = z.object({
  rows: z.number().int().positive().optional(),
  cols: z.number().int().positive().optional(),
});

/**
 * Overrides for the tag names the layout engine recognises
 */
export const kindsSchema = z.object({
  window: z.string().min(1).optional(),
  column: z.string().min(1).optional(),
  text: z.array(z.string().min(1)).optional(),
  textField: z.string().min(1).optional(),
  button: z.string().min(1).optional(),
});

/**
 * Schema for qmlterm.config.json
 */
export const configSchema = z
  .object({
    /**
     * Markup document to render when none is given on the command line
     */
    document: z.string().min(1).optional(),

    renderer: rendererSchema.optional(),

    screen: screenSizeSchema.optional(),

    /**
     * Values for bindings, looked up by name or dotted path
     */
    bindings: z.record(z.string(), z.unknown()).optional(),

    /**
     * Resolve `greeter.message` and `greeter.greet` bindings
     */
    greeter: z.boolean().optional(),

    kinds: kindsSchema.optional(),
  })
  .strict();

export type QmltermConfig = z.infer<typeof configSchema>;

export type ResolvedConfig = {
  document?: string;
  renderer: RendererMode;
  screen: { rows: number; cols: number };
  bindings: Record<string, unknown>;
  greeter: boolean;
  kinds: z.infer<typeof kindsSchema>;
};
