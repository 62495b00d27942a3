import * as path from 'path';
import { z } from 'zod';
import { FillError, FillErrorCode } from './errors';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform(value => value === 'true' || value === '1');

const EnvSchema = z.object({
  DOCX_FILLER_TEMPLATE_DIR: z.string().min(1).optional(),
  DOCX_FILLER_OUTPUT_DIR: z.string().min(1).optional(),
  DOCX_FILLER_DEFAULT_TEMPLATE: z.string().min(1).optional(),
  DOCX_FILLER_DEFAULT_OUTPUT: z
    .string()
    .regex(/\.docx$/i, 'must end in .docx')
    .optional(),
  DOCX_FILLER_VERBOSE: booleanFlag,
});

export interface ServerConfig {
  /** Base directory for relative template paths */
  templateDir: string;
  /** Base directory for relative output paths */
  outputDir: string;
  /** Template used when a request names none */
  defaultTemplate?: string;
  /** Output file used when a request names none */
  defaultOutput: string;
  /** Log a summary of every fill to stderr */
  verbose: boolean;
}

export const DEFAULT_OUTPUT_FILENAME = 'Generated.docx';

/**
 * Build the server configuration from environment variables.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Readonly<ServerConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new FillError(`Invalid configuration: ${issues.join('; ')}`, FillErrorCode.INVALID_ARGUMENTS, { issues });
  }

  const vars = parsed.data;
  return Object.freeze({
    templateDir: path.resolve(cwd, vars.DOCX_FILLER_TEMPLATE_DIR ?? '.'),
    outputDir: path.resolve(cwd, vars.DOCX_FILLER_OUTPUT_DIR ?? '.'),
    defaultTemplate: vars.DOCX_FILLER_DEFAULT_TEMPLATE,
    defaultOutput: vars.DOCX_FILLER_DEFAULT_OUTPUT ?? DEFAULT_OUTPUT_FILENAME,
    verbose: vars.DOCX_FILLER_VERBOSE,
  });
}
