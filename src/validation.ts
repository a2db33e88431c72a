import { z } from 'zod';
import type { Group, KillRule, RoundingPolicy, SearchMode, Team, UnmatchedPolicy } from './types';
import { TEAMS } from './types';
import { MalformedInputError } from './errors';

export const groupSchema = z.object({
  type: z.string().min(1, 'Unit type is required'),
  amount: z.number().int('Amount must be a whole number').min(0, 'Amount cannot be negative'),
  team: z.enum(TEAMS),
});

export const killRuleSchema = z.object({
  attacker: z.string().min(1, 'Attacker type is required'),
  defender: z.string().min(1, 'Defender type is required'),
  unitsRequired: z.number().int().min(1, 'At least one attacking unit is required'),
  killsDealt: z.number().int().min(0, 'Kills cannot be negative'),
});

export const killRulesSchema = z.array(killRuleSchema);

export function groupsSchema(maxGroups = Number.POSITIVE_INFINITY) {
  return z.array(groupSchema).max(maxGroups, `At most ${maxGroups} groups can be searched`);
}

export const roundingSchema = z.enum(['rounds', 'exact']);
export const unmatchedSchema = z.enum(['even-trade', 'no-effect']);
export const modeSchema = z.enum(['pairwise', 'linear']);

const optionsSchema = z.object({
  rounding: roundingSchema.optional(),
  unmatched: unmatchedSchema.optional(),
  favoredTeam: z.enum(TEAMS).optional(),
  mode: modeSchema.optional(),
});

export interface PathRequestOptions {
  rounding?: RoundingPolicy;
  unmatched?: UnmatchedPolicy;
  favoredTeam?: Team;
  mode?: SearchMode;
}

export interface PathRequest {
  groups: Group[];
  rules?: KillRule[];
  options: PathRequestOptions;
}

export function parseGroups(input: unknown, maxGroups = Number.POSITIVE_INFINITY): Group[] {
  return parseWith(groupsSchema(maxGroups), input, 'Invalid groups');
}

export function parseKillRules(input: unknown): KillRule[] {
  return parseWith(killRulesSchema, input, 'Invalid kill rules');
}

/** Validate a `POST /path` body */
export function parsePathRequest(body: unknown, maxGroups = Number.POSITIVE_INFINITY): PathRequest {
  const schema = z.object({
    groups: groupsSchema(maxGroups),
    rules: killRulesSchema.optional(),
    options: optionsSchema.default({}),
  });
  return parseWith(schema, body ?? {}, 'Invalid path request');
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown, message: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new MalformedInputError(message, formatIssues(parsed.error));
  }
  return parsed.data;
}

/** "groups.1.amount: Amount cannot be negative" */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
