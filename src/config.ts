import { z } from 'zod';

/** Schema for the environment variables the tool reads */
export const EnvConfigSchema = z.object({
  GITHUB_TOKEN: z.string().min(1).optional(),
  GH_TOKEN: z.string().min(1).optional(),
  PULLREQ_DEFAULT_BASE: z.string().min(1).default('master'),
});

/** Resolved configuration */
export interface Config {
  /** Token from the environment, if any; `gh auth token` is the fallback */
  token?: string;
  /** Branch used for `-b` when the flag is omitted */
  defaultBase: string;
}

/**
 * Read configuration from the environment.
 * Empty variables are treated as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = EnvConfigSchema.parse(cleaned);

  return {
    token: parsed.GITHUB_TOKEN ?? parsed.GH_TOKEN,
    defaultBase: parsed.PULLREQ_DEFAULT_BASE,
  };
}
