import { z } from 'zod';

// ── Reusable primitives ──

const kebabCase = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9-]*$/, 'must be kebab-case');

// ── Short format normalization ──

/**
 * Normalize a short-format step entry into object format.
 *
 * Short format:
 *   - `- install-dependencies`  →  `{ uses: install-dependencies }`
 */
export function normalizeStep(raw: unknown): unknown {
  if (typeof raw === 'string') {
    return { uses: raw };
  }
  return raw;
}

// ── Step schema ──

export const stepSchema = z.preprocess(
  normalizeStep,
  z
    .object({
      name: kebabCase.optional(),
      uses: kebabCase.optional(),
      run: z.string().min(1).optional(),
      description: z.string().optional(),
      enabled: z.boolean().default(true),
      cwd: z.string().optional(),
      env: z.record(z.string()).default({}),
    })
    .strict(),
);

// ── Pipeline schema ──

export const pipelineSchema = z.object({
  name: kebabCase.default('deploy'),
  description: z.string().optional(),
  cwd: z.string().optional(),
  env: z.record(z.string()).default({}),
  steps: z.array(stepSchema).min(1),
});

// ── Derived TypeScript types ──

export type StepConfig = z.infer<typeof stepSchema>;
export type Pipeline = z.infer<typeof pipelineSchema>;

/** A pipeline entry resolved to a concrete command */
export interface ResolvedStep {
  name: string;
  run: string;
  description: string | null;
  enabled: boolean;
  /** Absolute working directory */
  cwd: string;
  env: Record<string, string>;
  source: 'catalog' | 'inline';
}

/** Effective name of a step entry: explicit name, else the catalog step it uses */
export function stepName(step: StepConfig): string | undefined {
  return step.name ?? step.uses;
}

export const DEFAULT_CONFIG_FILE = 'provision.yaml';
