import { NotEnoughIdeasError } from '../errors';
import { CRITERIA } from '../engine/scoring';
import { rankByScore } from '../engine/selection';
import { createLogger } from '../util/logger';
import { DEFAULT_ELO, updateElo } from './elo';
import { comparedPairs, pairKey, pairwiseLimit, selectNextPair } from './pairing';
import type { Storage } from '../state/storage';
import type { Idea, PopulationState, Preferences, TournamentChoice, TournamentMode } from '../types';

const logger = createLogger('Tournament');

export interface PairPrompt {
  /** 1-based number of the decision being asked for. */
  number: number;
  limit: number | null;
  a: { id: string; title: string; overallScore: number; elo: number };
  b: { id: string; title: string; overallScore: number; elo: number };
}

/** Where choices come from and where progress lines go. */
export interface TournamentIO {
  ask(prompt: PairPrompt): Promise<string>;
  say(line: string): void;
}

export interface RankedIdea {
  id: string;
  title: string;
  value: number;
}

export interface TournamentResult {
  mode: TournamentMode;
  /** By overall score in auto mode, by Elo otherwise. */
  ranking: RankedIdea[];
  comparisonsMade: number;
  excluded: number;
}

export function hasCompleteScores(idea: Idea): boolean {
  return idea.overallScore !== null && CRITERIA.every(c => Number.isFinite(idea.scores[c]));
}

export function eligibleIdeas(state: PopulationState): { eligible: Idea[]; excluded: number } {
  const active = state.ideas.filter(i => i.status === 'active');
  const eligible = active.filter(hasCompleteScores);
  if (eligible.length < 2) {
    throw new NotEnoughIdeasError(eligible.length, active.length);
  }
  const excluded = active.length - eligible.length;
  if (excluded > 0) {
    logger.warn(`${excluded} active ideas have missing scores and were excluded`);
  }
  return { eligible, excluded };
}

export function emptyPreferences(): Preferences {
  return { comparisons: [], eloRatings: {} };
}

export function parseChoice(input: string): TournamentChoice | null {
  const choice = input.trim().toUpperCase();
  return choice === 'A' || choice === 'B' || choice === 'S' || choice === 'Q' ? choice : null;
}

const short = (title: string, max: number) => [...title].slice(0, max).join('');

interface Session {
  runId: string;
  storage: Storage;
  io: TournamentIO;
  ideas: Map<string, Idea>;
  preferences: Preferences;
  made: number;
}

function prompt(session: Session, idA: string, idB: string, limit: number | null): PairPrompt {
  const card = (id: string) => {
    const idea = session.ideas.get(id);
    return {
      id,
      title: idea?.title ?? 'Unknown',
      overallScore: idea?.overallScore ?? 0,
      elo: session.preferences.eloRatings[id] ?? DEFAULT_ELO
    };
  };
  return { number: session.made + 1, limit, a: card(idA), b: card(idB) };
}

function record(session: Session, idA: string, idB: string, winner: string) {
  const loser = winner === idA ? idB : idA;
  session.preferences.comparisons.push({ ideaA: idA, ideaB: idB, winner });
  updateElo(session.preferences.eloRatings, winner, loser);
  session.made++;
  session.io.say(`-> ${short(session.ideas.get(winner)?.title ?? winner, 40)} wins`);
}

function persist(session: Session) {
  session.storage.savePreferences(session.runId, session.preferences);
}

async function runExhaustive(session: Session, ids: string[]) {
  const recorded = comparedPairs(session.preferences.comparisons);

  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      const [idA, idB] = [ids[i], ids[j]];
      if (recorded.has(pairKey(idA, idB))) continue;

      const choice = parseChoice(await session.io.ask(prompt(session, idA, idB, null)));
      if (choice === 'Q') {
        session.io.say('Quitting tournament...');
        return;
      }
      if (choice === 'A') record(session, idA, idB, idA);
      else if (choice === 'B') record(session, idA, idB, idB);
      else session.io.say(choice === 'S' ? 'Skipped' : 'Invalid choice, skipping');

      persist(session);
    }
  }
}

async function runPairwise(session: Session, ids: string[]) {
  const limit = pairwiseLimit(ids.length);
  const compared = comparedPairs(session.preferences.comparisons);

  while (session.made < limit) {
    const pair = selectNextPair(ids, session.preferences.eloRatings, compared);
    if (!pair) {
      session.io.say('All pairs compared!');
      return;
    }
    const [idA, idB] = pair;

    const choice = parseChoice(await session.io.ask(prompt(session, idA, idB, limit)));
    if (choice === null) {
      session.io.say('Invalid choice, try again');
      continue;
    }
    if (choice === 'Q') {
      session.io.say('Quitting tournament...');
      return;
    }

    compared.add(pairKey(idA, idB));
    if (choice === 'A') record(session, idA, idB, idA);
    else if (choice === 'B') record(session, idA, idB, idB);
    else session.io.say('Skipped');

    persist(session);
  }
}

/**
 * Ranks a finished run's active scored ideas. Auto mode only reads; the
 * interactive modes save preferences after every answered prompt.
 */
export async function runTournament(options: {
  runId: string;
  storage: Storage;
  mode: TournamentMode;
  io: TournamentIO;
}): Promise<TournamentResult> {
  const { runId, storage, mode, io } = options;
  const state = storage.loadState(runId);
  const { eligible, excluded } = eligibleIdeas(state);

  if (mode === 'auto') {
    const ranking = rankByScore(eligible).map(i => ({ id: i.id, title: i.title, value: i.overallScore ?? 0 }));
    return { mode, ranking, comparisonsMade: 0, excluded };
  }

  const preferences = storage.loadPreferences(runId) ?? emptyPreferences();
  for (const idea of eligible) {
    if (preferences.eloRatings[idea.id] === undefined) {
      preferences.eloRatings[idea.id] = DEFAULT_ELO;
    }
  }

  const session: Session = {
    runId,
    storage,
    io,
    ideas: new Map(eligible.map((i): [string, Idea] => [i.id, i])),
    preferences,
    made: 0
  };
  const ids = eligible.map(i => i.id);

  if (mode === 'pairwise') {
    const n = ids.length;
    io.say(`Smart sampling: up to ${pairwiseLimit(n)} comparisons (vs ${(n * (n - 1)) / 2} for exhaustive)`);
    await runPairwise(session, ids);
  } else {
    await runExhaustive(session, ids);
  }

  const ranking = ids
    .map(id => ({ id, title: session.ideas.get(id)?.title ?? 'Unknown', value: preferences.eloRatings[id] ?? DEFAULT_ELO }))
    .sort((x, y) => y.value - x.value);

  logger.info(`Tournament finished`, { runId, mode, comparisons: session.made });
  return { mode, ranking, comparisonsMade: session.made, excluded };
}
