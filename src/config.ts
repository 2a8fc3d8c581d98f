import { z } from 'zod';
import { MinimizerError, failure } from './errors.js';

const environmentSchema = z.object({
  MINIMIZER_LEFT: z.coerce.number().finite().default(-1),
  MINIMIZER_RIGHT: z.coerce.number().finite().default(1),
  MINIMIZER_PRECISION: z.coerce.number().int().default(5),
  MINIMIZER_FUNCTION: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
});

export type Environment = z.infer<typeof environmentSchema>;

export interface MinimizerConfig {
  left: number;
  right: number;
  precision: number;
  functionIndex: number;
  logLevel: Environment['LOG_LEVEL'];
}

/**
 * Read session defaults from environment variables.
 * Empty values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): MinimizerConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(environmentSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = environmentSchema.safeParse(present);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))].join(', ');
    throw new MinimizerError(
      failure('InvalidConfiguration', { variables }, `Missing or invalid environment variables: ${variables}`),
    );
  }

  const vars = parsed.data;
  return {
    left: vars.MINIMIZER_LEFT,
    right: vars.MINIMIZER_RIGHT,
    precision: vars.MINIMIZER_PRECISION,
    functionIndex: vars.MINIMIZER_FUNCTION,
    logLevel: vars.LOG_LEVEL,
  };
}
