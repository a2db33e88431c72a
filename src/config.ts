import { z } from 'zod';
import type { RoundingPolicy, SearchMode, Team, UnmatchedPolicy } from './types';
import { DEFAULT_FAVORED_TEAM, DEFAULT_ROUNDING, DEFAULT_UNMATCHED, TEAMS } from './types';
import { formatIssues, modeSchema, roundingSchema, unmatchedSchema } from './validation';

/** Largest problem accepted over HTTP; the pairwise search grows factorially. */
export const DEFAULT_MAX_GROUPS = 7;

export const DEFAULT_PORT = 8000;

export interface PlannerConfig {
  port: number;
  name: string;
  rounding: RoundingPolicy;
  unmatched: UnmatchedPolicy;
  favoredTeam: Team;
  mode: SearchMode;
  maxGroups: number;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  PLANNER_NAME: z.string().min(1).default('Battle Path Planner'),
  ROUNDING_POLICY: roundingSchema.default(DEFAULT_ROUNDING),
  UNMATCHED_POLICY: unmatchedSchema.default(DEFAULT_UNMATCHED),
  FAVORED_TEAM: z.enum(TEAMS).default(DEFAULT_FAVORED_TEAM),
  SEARCH_MODE: modeSchema.default('pairwise'),
  MAX_GROUPS: z.coerce.number().int().positive().default(DEFAULT_MAX_GROUPS),
});

/**
 * Read planner settings from the environment.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlannerConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new Error(`Invalid environment configuration: ${formatIssues(parsed.error).join('; ')}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    name: vars.PLANNER_NAME,
    rounding: vars.ROUNDING_POLICY,
    unmatched: vars.UNMATCHED_POLICY,
    favoredTeam: vars.FAVORED_TEAM,
    mode: vars.SEARCH_MODE,
    maxGroups: vars.MAX_GROUPS,
  };
}
