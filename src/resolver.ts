import type { BattleRules, Group, Interaction, KillRate, RoundingPolicy } from './types';
import { TYPELESS, createBattleRules, describeGroup, lookupKillRate } from './types';
import { InvalidOperationError } from './errors';

export type BattleOutcome = [Group | null, Group | null];

const STOCK_RULES = createBattleRules();

/**
 * Merge two same-team groups. The larger group names the result;
 * on a tie the left operand's type wins.
 */
export function combine(left: Group, right: Group): Group {
  if (left.team !== right.team) {
    throw new InvalidOperationError(`Cannot combine ${left.team} group with ${right.team} group`);
  }
  return {
    type: left.amount >= right.amount ? left.type : right.type,
    amount: left.amount + right.amount,
    team: left.team,
  };
}

/** Defenders killed by `attackerAmount` units fighting at `rate` */
export function casualties(attackerAmount: number, rate: KillRate, rounding: RoundingPolicy): number {
  const rounds = attackerAmount / rate.unitsRequired;
  return (rounding === 'rounds' ? Math.floor(rounds) : rounds) * rate.killsDealt;
}

/**
 * Resolve a fight between opposing groups.
 *
 * A kill rule makes the fight one-sided: the side holding the rule takes no
 * losses. Same-type and typeless fights, and pairs with no rule in either
 * direction, resolve by `rules.unmatched`. Eliminated sides come back as null.
 */
export function battle(first: Group, second: Group, rules: BattleRules = STOCK_RULES): BattleOutcome {
  if (first.team === second.team) {
    throw new InvalidOperationError(`Cannot battle two ${first.team} groups`);
  }

  if (first.type === second.type || first.type === TYPELESS || second.type === TYPELESS) {
    return resolveUnmatched(first, second, rules);
  }

  const forward = lookupKillRate(rules.killTable, first.type, second.type);
  if (forward) {
    return survivors(first, second, first.amount, second.amount - casualties(first.amount, forward, rules.rounding));
  }

  const backward = lookupKillRate(rules.killTable, second.type, first.type);
  if (backward) {
    return survivors(first, second, first.amount - casualties(second.amount, backward, rules.rounding), second.amount);
  }

  return resolveUnmatched(first, second, rules);
}

/**
 * Let two groups interact: combine when they share a team, battle otherwise.
 * `first` is the attacker of a battle and the left operand of a combine.
 */
export function interact(first: Group, second: Group, rules: BattleRules = STOCK_RULES): Interaction {
  if (first.team === second.team) {
    const output = combine(first, second);
    return {
      kind: 'combine',
      inputs: [first, second],
      output,
      description: `${describeGroup(first)} + ${describeGroup(second)} -> ${describeGroup(output)}`,
    };
  }

  const [attackerAfter, defenderAfter] = battle(first, second, rules);
  return {
    kind: 'battle',
    attacker: first,
    defender: second,
    attackerAfter,
    defenderAfter,
    description: `${describeGroup(first)} vs ${describeGroup(second)} -> ${describeSide(first, attackerAfter)}, ${describeSide(second, defenderAfter)}`,
  };
}

/** Groups produced by an interaction, in attacker-then-defender order */
export function interactionOutputs(interaction: Interaction): Group[] {
  if (interaction.kind === 'combine') {
    return [interaction.output];
  }
  return [interaction.attackerAfter, interaction.defenderAfter].filter((g): g is Group => g !== null);
}

function resolveUnmatched(first: Group, second: Group, rules: BattleRules): BattleOutcome {
  if (rules.unmatched === 'no-effect') {
    return survivors(first, second, first.amount, second.amount);
  }
  return survivors(first, second, first.amount - second.amount, second.amount - first.amount);
}

function survivors(first: Group, second: Group, firstAmount: number, secondAmount: number): BattleOutcome {
  return [withAmount(first, firstAmount), withAmount(second, secondAmount)];
}

function withAmount(group: Group, amount: number): Group | null {
  const clamped = Math.max(0, amount);
  return clamped > 0 ? { ...group, amount: clamped } : null;
}

function describeSide(before: Group, after: Group | null): string {
  return after ? describeGroup(after) : `${before.team.toUpperCase()} wiped out`;
}
