import { OutputFormatSchema, type OutputFormat } from '../../core/config/schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

/**
 * Validate a `--format` value.
 */
export function parseFormatOption(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  const result = OutputFormatSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `Invalid format: ${value} (expected ${OutputFormatSchema.options.join(', ')})`
    );
  }
  return result.data;
}
