import { z } from 'zod';

const cleanupToggle = z.enum(['clear_browser_caches', 'clear_system_logs']);

/** A catalog command: plain string, or gated by a cleanup setting */
export const catalogCommandSchema = z.union([
  z.string().min(1),
  z.object({
    cmd: z.string().min(1),
    when: cleanupToggle.optional(),
  }),
]);

export const catalogStepSchema = z.object({
  name: z.string().min(1),
  commands: z.array(catalogCommandSchema).default([]),
});

export const catalogSchema = z.object({
  steps: z.array(catalogStepSchema).min(1),
});

export type CatalogCommand = z.infer<typeof catalogCommandSchema>;
export type CatalogStep = z.infer<typeof catalogStepSchema>;
export type Catalog = z.infer<typeof catalogSchema>;
