import type { CellState, Game, RandomSource } from "../src/engine/index";

// Replays the given values in order, wrapping around at the end.
export function sequenceRng(values: number[]): RandomSource {
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}

export function countMined(cells: readonly CellState[]): number {
  return cells.filter((c) => c.kind !== "counted" && c.mined).length;
}

export function cellAt(game: Game, index: number): CellState {
  return game.cellState(index % game.width, Math.floor(index / game.width));
}

export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
