import { otherSlot, type MatchResult, type Slot } from "./sim/state.js";

export const MAX_BEST_OF = 9;

export type SeriesStanding = {
  // Round being played, or the last one once the series is decided.
  round: number;
  bestOf: number;
  wins: [number, number];
  // Eliminations credited to each slot: every time one actor falls, the other scores.
  kills: [number, number];
  decided: boolean;
  winner: Slot | null;
};

export function isBestOf(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= MAX_BEST_OF && value % 2 === 1;
}

/**
 * Best-of-N scoring across matches in one room. A slot takes the series at a majority
 * of round wins; drawn rounds count toward the cap, and a capped series goes to the
 * side with more wins or ends level.
 */
export class Series {
  readonly bestOf: number;
  private played = 0;
  private readonly wins: [number, number] = [0, 0];
  private readonly kills: [number, number] = [0, 0];
  private decided = false;
  private winner: Slot | null = null;

  constructor(bestOf: number) {
    if (!isBestOf(bestOf)) throw new RangeError(`bestOf must be an odd integer in [1, ${MAX_BEST_OF}], got ${bestOf}`);
    this.bestOf = bestOf;
  }

  get needed(): number {
    return Math.floor(this.bestOf / 2) + 1;
  }

  get isDecided(): boolean {
    return this.decided;
  }

  recordRound(result: MatchResult): SeriesStanding {
    if (this.decided) throw new Error("Series already decided");
    this.played += 1;
    if (result.winner !== null) this.wins[result.winner] += 1;
    for (const fallen of result.eliminations) this.kills[otherSlot(fallen)] += 1;

    const [a, b] = this.wins;
    if (a >= this.needed || b >= this.needed) {
      this.decide(a > b ? 0 : 1);
    } else if (this.played >= this.bestOf) {
      this.decide(a === b ? null : a > b ? 0 : 1);
    }
    return this.standing();
  }

  standing(): SeriesStanding {
    return {
      round: this.decided ? this.played : this.played + 1,
      bestOf: this.bestOf,
      wins: [this.wins[0], this.wins[1]],
      kills: [this.kills[0], this.kills[1]],
      decided: this.decided,
      winner: this.winner,
    };
  }

  private decide(winner: Slot | null) {
    this.decided = true;
    this.winner = winner;
  }
}
