import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import YAML from 'yaml';
import { ZodError } from 'zod';
import { ProvisionError, ErrorCode } from '../lib/errors.js';
import { debug } from '../lib/utils/debug.js';
import { STEP_CATALOG, defaultPipeline, type CatalogEntry } from './catalog.js';
import {
  pipelineSchema,
  stepName,
  DEFAULT_CONFIG_FILE,
  type Pipeline,
  type ResolvedStep,
} from './types.js';

// ── Pre-validation (catch structural errors before Zod) ──

function preValidate(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return '✗ provision.yaml must contain a YAML object\n  Example:\n    name: deploy\n    steps:\n      - install-dependencies\n      - apply-migrations';
  }

  if ('name' in raw && typeof raw.name === 'number') {
    return '✗ pipeline.name must be a string, not a number\n  Example: name: "deploy"';
  }

  return null;
}

// ── Error formatting ──

export function formatConfigError(error: ZodError): string {
  const lines: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join('.');

    // Friendly messages for common mistakes
    if (path === 'steps' && issue.code === 'too_small') {
      lines.push('✗ pipeline.steps must have at least one step');
      lines.push('  Example:\n    steps:\n      - install-dependencies');
      continue;
    }

    if (path === 'name' && issue.code === 'invalid_string') {
      lines.push('✗ pipeline.name must be kebab-case');
      lines.push('  Example: deploy, deploy-staging');
      continue;
    }

    if (issue.code === 'custom') {
      // Business rule errors from superRefine
      lines.push(`✗ ${issue.message}`);
      continue;
    }

    lines.push(`✗ ${path}: ${issue.message}`);
  }

  return lines.join('\n');
}

// ── Business rule validation (superRefine) ──

const pipelineWithRules = pipelineSchema.superRefine((pipeline, ctx) => {
  const seen = new Set<string>();

  for (const [index, step] of pipeline.steps.entries()) {
    const label = `step ${index + 1}`;

    // 1. Exactly one of uses/run
    if (step.uses !== undefined && step.run !== undefined) {
      ctx.addIssue({ code: 'custom', message: `${label}: use either "uses" or "run", not both` });
    } else if (step.uses === undefined && step.run === undefined) {
      ctx.addIssue({
        code: 'custom',
        message: `${label}: needs "uses" (a catalog step) or "run" (a shell command)`,
      });
    }

    // 2. Inline commands must be named
    if (step.run !== undefined && step.name === undefined) {
      ctx.addIssue({ code: 'custom', message: `${label}: inline "run" steps need a "name"` });
    }

    // 3. Unique effective names
    const name = stepName(step);
    if (name !== undefined) {
      if (seen.has(name)) {
        ctx.addIssue({ code: 'custom', message: `duplicate step name: "${name}"` });
      }
      seen.add(name);
    }
  }
});

// ── Public API ──

/** Parse a YAML string into a validated Pipeline. Throws ProvisionError on failure. */
export function parsePipelineYaml(content: string): Pipeline {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new ProvisionError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
      'Check provision.yaml for syntax errors (indentation, colons, etc.)',
    );
  }

  const preError = preValidate(raw);
  if (preError) {
    throw new ProvisionError(ErrorCode.CONFIG_VALIDATION_ERROR, preError);
  }

  const result = pipelineWithRules.safeParse(raw);
  if (!result.success) {
    throw new ProvisionError(
      ErrorCode.CONFIG_VALIDATION_ERROR,
      formatConfigError(result.error),
      'Fix the issues above and try again',
    );
  }

  return result.data;
}

/** Load and parse a pipeline file. Throws ProvisionError on failure. */
export function loadPipelineFile(filePath: string): Pipeline {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new ProvisionError(
      ErrorCode.CONFIG_NOT_FOUND,
      `pipeline file not found: ${filePath}`,
      'Run: provision --config <path-to-provision.yaml>',
    );
  }

  return parsePipelineYaml(content);
}

export interface LoadPipelineOptions {
  cwd?: string;
  configFile?: string;
}

export interface LoadedPipeline {
  pipeline: Pipeline;
  /** Absolute path of the file read, or null for the built-in pipeline */
  configFile: string | null;
  /** Directory relative `cwd` entries resolve against */
  baseDir: string;
}

/**
 * Load the explicit config file, else ./provision.yaml, else the built-in pipeline.
 */
export function loadPipeline(options: LoadPipelineOptions = {}): LoadedPipeline {
  const cwd = resolve(options.cwd ?? process.cwd());

  const configFile = options.configFile
    ? resolve(cwd, options.configFile)
    : join(cwd, DEFAULT_CONFIG_FILE);

  if (options.configFile || existsSync(configFile)) {
    debug('pipeline', `loading ${configFile}`);
    return { pipeline: loadPipelineFile(configFile), configFile, baseDir: dirname(configFile) };
  }

  debug('pipeline', `no ${DEFAULT_CONFIG_FILE} in ${cwd}, using built-in pipeline`);
  return { pipeline: defaultPipeline(), configFile: null, baseDir: cwd };
}

export interface ResolvePipelineOptions {
  baseDir: string;
  catalog?: ReadonlyMap<string, CatalogEntry>;
}

/**
 * Resolve every entry (disabled ones included) to a concrete command, in declaration order.
 */
export function resolvePipeline(pipeline: Pipeline, options: ResolvePipelineOptions): ResolvedStep[] {
  const catalog = options.catalog ?? STEP_CATALOG;
  const root = resolve(options.baseDir, pipeline.cwd ?? '.');

  return pipeline.steps.map((step, index) => {
    const common = {
      enabled: step.enabled,
      cwd: resolve(root, step.cwd ?? '.'),
      env: { ...pipeline.env, ...step.env },
    };

    if (step.uses !== undefined) {
      const entry = catalog.get(step.uses);
      if (!entry) {
        throw new ProvisionError(
          ErrorCode.ACTION_UNRESOLVED,
          `step ${index + 1}: "${step.uses}" is not in the step catalog`,
          `Available: ${[...catalog.keys()].join(', ')}`,
        );
      }
      return {
        name: step.name ?? step.uses,
        run: entry.run,
        description: step.description ?? entry.description,
        source: 'catalog' as const,
        ...common,
      };
    }

    if (step.run !== undefined && step.name !== undefined) {
      return {
        name: step.name,
        run: step.run,
        description: step.description ?? null,
        source: 'inline' as const,
        ...common,
      };
    }

    throw new ProvisionError(
      ErrorCode.ACTION_UNRESOLVED,
      `step ${index + 1} has neither "uses" nor a named "run"`,
    );
  });
}
