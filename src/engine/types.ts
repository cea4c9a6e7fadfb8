import type { RandomSource } from "./rng";

export type CellState =
  | { readonly kind: "unknown"; readonly mined: boolean }
  | { readonly kind: "known"; readonly mined: boolean }
  | { readonly kind: "flagged"; readonly mined: boolean }
  | { readonly kind: "questioned"; readonly mined: boolean }
  | { readonly kind: "counted"; readonly count: number }; // 1..8

export type CellKind = CellState["kind"];

export enum GamePhase {
  Initial = "initial",
  Playing = "playing",
  Won = "won",
  Lost = "lost",
}

export interface Pos {
  x: number;
  y: number;
}

/** Mine count for area A is round(A² · a + A · b + c). */
export interface DensityCurve {
  a: number;
  b: number;
  c: number;
}

export interface GameOptions {
  random: RandomSource;
  density: DensityCurve;
  // Off: Won is never produced, uncover only freezes on Lost.
  detectWin: boolean;
}

export const DEFAULT_DENSITY: DensityCurve = {
  a: 0.0002,
  b: 0.0938,
  c: 0.8937,
};

/** Default options */
export const DEFAULT_OPTIONS: GameOptions = {
  random: Math.random,
  density: DEFAULT_DENSITY,
  detectWin: false,
};

export type BoardLevel = "easy" | "medium" | "difficult";

export interface BoardSize {
  width: number;
  height: number;
}

export const BOARD_LEVELS: Record<BoardLevel, BoardSize> = {
  easy:      { width: 8,  height: 10 },
  medium:    { width: 12, height: 16 },
  difficult: { width: 30, height: 18 },
};

export function isBoardLevel(value: string): value is BoardLevel {
  return Object.prototype.hasOwnProperty.call(BOARD_LEVELS, value);
}

// Cells are frozen; the grid swaps in a new value on every transition.
export const unknown = (mined: boolean): CellState => Object.freeze({ kind: "unknown", mined });
export const known = (mined: boolean): CellState => Object.freeze({ kind: "known", mined });
export const flagged = (mined: boolean): CellState => Object.freeze({ kind: "flagged", mined });
export const questioned = (mined: boolean): CellState => Object.freeze({ kind: "questioned", mined });
export const counted = (count: number): CellState => Object.freeze({ kind: "counted", count });
