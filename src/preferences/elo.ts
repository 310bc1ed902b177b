export const ELO_K = 32;
export const DEFAULT_ELO = 1000;

export interface EloDelta {
  winner: number;
  loser: number;
}

export function expectedScore(rating: number, opponent: number): number {
  return 1 / (1 + Math.pow(10, (opponent - rating) / 400));
}

/** Updates `ratings` in place for one decided comparison. Zero-sum. */
export function updateElo(ratings: Record<string, number>, winnerId: string, loserId: string): EloDelta {
  const winnerElo = ratings[winnerId] ?? DEFAULT_ELO;
  const loserElo = ratings[loserId] ?? DEFAULT_ELO;

  const gain = ELO_K * (1 - expectedScore(winnerElo, loserElo));
  ratings[winnerId] = winnerElo + gain;
  ratings[loserId] = loserElo - gain;

  return { winner: gain, loser: -gain };
}
