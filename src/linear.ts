import type { Group, Interaction, PathResult } from './types';
import { DEFAULT_FAVORED_TEAM, computeAdvantage, createBattleRules, isAlive } from './types';
import { interact } from './resolver';
import { MalformedInputError } from './errors';
import type { SearchOptions } from './search';

export interface LinearOutcome {
  advantage: number;
  steps: Interaction[];
  survivors: Group[];
}

export interface LinearPathResult extends PathResult {
  order: number[];
}

/**
 * Play the groups in a fixed order. The first group carries the fight:
 * each following group merges into it (same team) or is fought by it.
 * Fights go through `battle` with the configured rules, so reverse kill
 * rules and unmatched-pair policies apply to the carrier too.
 * A carrier with no units, or one wiped out, leaves the rest of the order untouched.
 */
export function simulateLinearPath(
  groups: readonly Group[],
  order: readonly number[],
  options: SearchOptions = {}
): LinearOutcome {
  assertPermutation(order, groups.length);
  const rules = options.rules ?? createBattleRules();
  const favoredTeam = options.favoredTeam ?? DEFAULT_FAVORED_TEAM;

  const steps: Interaction[] = [];
  const standing: Group[] = [];
  let carrier: Group | null = null;
  if (order.length > 0) {
    const first = groups[order[0]];
    if (isAlive(first)) {
      carrier = first;
    } else {
      standing.push(first);
    }
  }

  for (const index of order.slice(1)) {
    const next = groups[index];
    if (!carrier) {
      standing.push(next);
      continue;
    }
    if (!isAlive(next)) continue;

    const step = interact(carrier, next, rules);
    steps.push(step);

    if (step.kind === 'combine') {
      carrier = step.output;
    } else {
      carrier = step.attackerAfter;
      if (step.defenderAfter) {
        standing.push(step.defenderAfter);
      }
    }
  }

  const survivors = (carrier ? [carrier, ...standing] : standing).filter(isAlive);
  return { advantage: computeAdvantage(survivors, favoredTeam), steps, survivors };
}

/** Try every ordering and keep the first one with the best advantage */
export function findBestLinearPath(groups: readonly Group[], options: SearchOptions = {}): LinearPathResult {
  let best: { order: number[]; outcome: LinearOutcome } | null = null;
  let tried = 0;

  for (const order of permutations(groups.map((_, index) => index))) {
    tried++;
    const outcome = simulateLinearPath(groups, order, options);
    if (!best || outcome.advantage > best.outcome.advantage) {
      best = { order, outcome };
    }
  }

  const favoredTeam = options.favoredTeam ?? DEFAULT_FAVORED_TEAM;
  const winner = best ?? { order: [], outcome: { advantage: 0, steps: [], survivors: [] } };
  return {
    advantage: winner.outcome.advantage,
    favoredTeam,
    steps: winner.outcome.steps,
    survivors: winner.outcome.survivors,
    stats: { statesExplored: tried, cacheHits: 0 },
    order: winner.order,
  };
}

/** Lexicographic permutations of `items`; yields a single empty order for no items */
export function* permutations(items: readonly number[]): Generator<number[]> {
  if (items.length === 0) {
    yield [];
    return;
  }
  for (let i = 0; i < items.length; i++) {
    const rest = [...items.slice(0, i), ...items.slice(i + 1)];
    for (const tail of permutations(rest)) {
      yield [items[i], ...tail];
    }
  }
}

function assertPermutation(order: readonly number[], size: number): void {
  const seen = new Set(order);
  const valid = order.length === size
    && seen.size === size
    && order.every(index => Number.isInteger(index) && index >= 0 && index < size);
  if (!valid) {
    throw new MalformedInputError('Order must list every group index exactly once', [
      `expected a permutation of 0..${size - 1}, got [${order.join(', ')}]`,
    ]);
  }
}
