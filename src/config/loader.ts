/**
 * Format configuration loader.
 *
 * Reads a YAML file, validates it, and maps it onto render options
 * and the logger level. A missing file yields the defaults.
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod/v4';
import { setLogLevel } from '../shared/utils/debug.js';
import type { LogLevel } from '../shared/utils/debug.js';
import { getErrorMessage } from '../shared/utils/error.js';
import type { RenderOptions, UnterminatedPolicy } from '../runtime-format/types.js';

const FormatConfigSchema = z.object({
  unterminated_placeholder: z.enum(['literal', 'drop']).optional(),
  log_level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
}).passthrough();

export interface FormatConfig {
  unterminatedPlaceholder: UnterminatedPolicy;
  logLevel: LogLevel;
}

export const DEFAULT_FORMAT_CONFIG: Readonly<FormatConfig> = {
  unterminatedPlaceholder: 'literal',
  logLevel: 'silent',
};

export class FormatConfigError extends Error {
  constructor(
    readonly filePath: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Invalid format config ${filePath}: ${detail}`, options);
    this.name = 'FormatConfigError';
  }
}

/**
 * Load and validate a format config file.
 *
 * An empty file is treated like a missing one.
 */
export function loadFormatConfig(filePath: string): FormatConfig {
  if (!existsSync(filePath)) {
    return { ...DEFAULT_FORMAT_CONFIG };
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err: unknown) {
    throw new FormatConfigError(filePath, getErrorMessage(err), { cause: err });
  }
  if (raw == null) {
    return { ...DEFAULT_FORMAT_CONFIG };
  }

  const parsed = FormatConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new FormatConfigError(filePath, detail);
  }

  return {
    unterminatedPlaceholder: parsed.data.unterminated_placeholder ?? DEFAULT_FORMAT_CONFIG.unterminatedPlaceholder,
    logLevel: parsed.data.log_level ?? DEFAULT_FORMAT_CONFIG.logLevel,
  };
}

export function toRenderOptions(config: FormatConfig): RenderOptions {
  return { unterminated: config.unterminatedPlaceholder };
}

/** Apply process-wide settings (the log level) from a loaded config. */
export function applyFormatConfig(config: FormatConfig): void {
  setLogLevel(config.logLevel);
}
