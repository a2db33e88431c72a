import type { BattleRules, Group, Interaction, PathResult, SearchStats, Team } from './types';
import { DEFAULT_FAVORED_TEAM, computeAdvantage, createBattleRules, groupKey, isAlive } from './types';
import { interact, interactionOutputs } from './resolver';

export interface SearchOptions {
  rules?: BattleRules;
  favoredTeam?: Team;
}

/** Unconsumed originals by index, plus groups produced by earlier steps */
export interface SearchState {
  remaining: readonly number[];
  derived: readonly Group[];
}

interface Entry {
  group: Group;
  /** Index of the original group, or null for a derived one */
  origin: number | null;
  /** Position in `derived` for derived entries */
  slot: number;
}

interface Outcome {
  advantage: number;
  steps: Interaction[];
  survivors: Group[];
}

interface SearchContext {
  groups: readonly Group[];
  rules: BattleRules;
  favoredTeam: Team;
  cache: Map<string, Outcome> | null;
  stats: SearchStats;
}

/**
 * Find the sequence of pairwise interactions that leaves the favored team
 * with the largest advantage.
 *
 * Every step pairs at least one unconsumed original with another group
 * (original or derived), so the search always terminates. Identical
 * subproblems reached through different orderings are answered from a cache
 * that lives only for this call.
 */
export function findBestPath(groups: readonly Group[], options: SearchOptions = {}): PathResult {
  return runSearch(groups, options, new Map<string, Outcome>());
}

/** Same exploration as `findBestPath` with no cache at all */
export function bruteForceBestPath(groups: readonly Group[], options: SearchOptions = {}): PathResult {
  return runSearch(groups, options, null);
}

function runSearch(groups: readonly Group[], options: SearchOptions, cache: Map<string, Outcome> | null): PathResult {
  const context: SearchContext = {
    groups,
    rules: options.rules ?? createBattleRules(),
    favoredTeam: options.favoredTeam ?? DEFAULT_FAVORED_TEAM,
    cache,
    stats: { statesExplored: 0, cacheHits: 0 },
  };

  const outcome = explore(context, { remaining: groups.map((_, index) => index), derived: [] });

  return {
    advantage: outcome.advantage,
    favoredTeam: context.favoredTeam,
    steps: outcome.steps,
    survivors: outcome.survivors,
    stats: context.stats,
  };
}

export function stateKey(state: SearchState): string {
  return JSON.stringify([state.remaining, state.derived.map(groupKey)]);
}

function explore(context: SearchContext, state: SearchState): Outcome {
  const key = stateKey(state);
  const cached = context.cache?.get(key);
  if (cached) {
    context.stats.cacheHits++;
    return cached;
  }
  context.stats.statesExplored++;

  const entries = workingSet(context.groups, state);
  let best: Outcome | null = null;

  for (const first of entries) {
    for (const second of entries) {
      if (first === second || (first.origin === null && second.origin === null)) {
        continue;
      }

      const interaction = interact(first.group, second.group, context.rules);
      const sub = explore(context, nextState(state, first, second, interactionOutputs(interaction)));

      if (!best || sub.advantage > best.advantage) {
        best = { advantage: sub.advantage, steps: [interaction, ...sub.steps], survivors: sub.survivors };
      }
    }
  }

  if (!best) {
    const survivors = entries.map(e => e.group).filter(isAlive);
    best = { advantage: computeAdvantage(survivors, context.favoredTeam), steps: [], survivors };
  }

  context.cache?.set(key, best);
  return best;
}

function workingSet(groups: readonly Group[], state: SearchState): Entry[] {
  const originals = state.remaining.map((index): Entry => ({ group: groups[index], origin: index, slot: -1 }));
  const derived = state.derived.map((group, slot): Entry => ({ group, origin: null, slot }));
  return [...originals, ...derived];
}

function nextState(state: SearchState, first: Entry, second: Entry, outputs: Group[]): SearchState {
  const picked = [first, second];
  const consumed = new Set(picked.map(e => e.origin));
  const usedSlots = new Set(picked.filter(e => e.origin === null).map(e => e.slot));

  const derived = [...state.derived.filter((_, slot) => !usedSlots.has(slot)), ...outputs];
  derived.sort((a, b) => compareKeys(groupKey(a), groupKey(b)));

  return {
    remaining: state.remaining.filter(index => !consumed.has(index)),
    derived,
  };
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
