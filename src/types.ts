/**
 * Battle path planner – group, kill-rate and result types plus score helpers.
 */

export type Team = 'blue' | 'red';

export const TEAMS = ['blue', 'red'] as const;

/** Unit types are open-ended: any non-empty string names one. */
export type UnitType = string;

/** Neutral marker. A typeless group never uses the kill table. */
export const TYPELESS: UnitType = 'typeless';

export interface Group {
  type: UnitType;
  amount: number;
  team: Team;
}

/** For every `unitsRequired` attacking units, `killsDealt` defenders die. */
export interface KillRate {
  unitsRequired: number;
  killsDealt: number;
}

export interface KillRule extends KillRate {
  attacker: UnitType;
  defender: UnitType;
}

export type KillTable = ReadonlyMap<string, KillRate>;

/** `rounds` discards remainder kills; `exact` keeps fractional kills. */
export type RoundingPolicy = 'rounds' | 'exact';

/** What a battle without an applicable kill rule does. */
export type UnmatchedPolicy = 'even-trade' | 'no-effect';

export type SearchMode = 'pairwise' | 'linear';

export interface BattleRules {
  killTable: KillTable;
  rounding: RoundingPolicy;
  unmatched: UnmatchedPolicy;
}

export type Interaction =
  | { kind: 'combine'; inputs: [Group, Group]; output: Group; description: string }
  | {
      kind: 'battle';
      attacker: Group;
      defender: Group;
      attackerAfter: Group | null;
      defenderAfter: Group | null;
      description: string;
    };

export interface SearchStats {
  statesExplored: number;
  cacheHits: number;
}

export interface PathResult {
  advantage: number;
  favoredTeam: Team;
  steps: Interaction[];
  survivors: Group[];
  stats: SearchStats;
}

// ============ DEFAULTS ============

/** Rock-paper-scissors between the three stock unit types */
export const DEFAULT_KILL_RULES: readonly KillRule[] = [
  { attacker: 'archers', defender: 'warriors', unitsRequired: 2, killsDealt: 3 },
  { attacker: 'warriors', defender: 'soldiers', unitsRequired: 2, killsDealt: 3 },
  { attacker: 'soldiers', defender: 'archers', unitsRequired: 2, killsDealt: 2 },
];

export const DEFAULT_ROUNDING: RoundingPolicy = 'rounds';

export const DEFAULT_UNMATCHED: UnmatchedPolicy = 'even-trade';

export const DEFAULT_FAVORED_TEAM: Team = 'blue';

// ============ KILL TABLE ============

export function killRuleKey(attacker: UnitType, defender: UnitType): string {
  return JSON.stringify([attacker, defender]);
}

/** Later rules for the same (attacker, defender) pair replace earlier ones. */
export function buildKillTable(rules: readonly KillRule[]): KillTable {
  const table = new Map<string, KillRate>();
  for (const rule of rules) {
    table.set(killRuleKey(rule.attacker, rule.defender), {
      unitsRequired: rule.unitsRequired,
      killsDealt: rule.killsDealt,
    });
  }
  return table;
}

export function lookupKillRate(table: KillTable, attacker: UnitType, defender: UnitType): KillRate | undefined {
  return table.get(killRuleKey(attacker, defender));
}

export function createBattleRules(overrides: Partial<BattleRules> = {}): BattleRules {
  return {
    killTable: buildKillTable(DEFAULT_KILL_RULES),
    rounding: DEFAULT_ROUNDING,
    unmatched: DEFAULT_UNMATCHED,
    ...overrides,
  };
}

// ============ SCORE HELPERS ============

export function otherTeam(team: Team): Team {
  return team === 'blue' ? 'red' : 'blue';
}

export function isAlive(group: Group): boolean {
  return group.amount > 0;
}

export function teamTotal(groups: readonly Group[], team: Team): number {
  return groups
    .filter(g => g.team === team)
    .reduce((sum, g) => sum + g.amount, 0);
}

/** Favored team's surviving total minus the other team's */
export function computeAdvantage(groups: readonly Group[], favoredTeam: Team): number {
  return teamTotal(groups, favoredTeam) - teamTotal(groups, otherTeam(favoredTeam));
}

/** Stable text form, used to sort groups into a canonical order */
export function groupKey(group: Group): string {
  return JSON.stringify([group.team, group.type, group.amount]);
}

export function formatAmount(amount: number): string {
  return Number.isInteger(amount) ? String(amount) : amount.toFixed(2);
}

/** e.g. "BLUE 11x archers" */
export function describeGroup(group: Group): string {
  return `${group.team.toUpperCase()} ${formatAmount(group.amount)}x ${group.type}`;
}
