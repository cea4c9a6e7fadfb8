import { CellState, DensityCurve, Pos, unknown } from "./types";
import { RandomSource, randomIndex } from "./rng";
import { invalidDimensions, invalidLayout } from "./errors";

export function cellIndex(x: number, y: number, width: number): number {
  return y * width + x;
}

export function inBounds(x: number, y: number, width: number, height: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    x < width &&
    y >= 0 &&
    y < height
  );
}

// 3×3 block around (x, y), minus the centre and anything off the board
export function neighbours(x: number, y: number, width: number, height: number): Pos[] {
  const result: Pos[] = [];
  for (let dy = -1; dy <= 1; dy++) {
    const ny = y + dy;
    if (ny < 0 || ny >= height) continue;
    for (let dx = -1; dx <= 1; dx++) {
      if (dx === 0 && dy === 0) continue;
      const nx = x + dx;
      if (nx < 0 || nx >= width) continue;
      result.push({ x: nx, y: ny });
    }
  }
  return result;
}

export function mineCountForArea(area: number, curve: DensityCurve): number {
  return Math.round(area * area * curve.a + area * curve.b + curve.c);
}

export function checkSize(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw invalidDimensions(`${width}x${height} is not a positive integer size`);
  }
}

/**
 * Validates the board size and returns how many mines it gets.
 * Rejects sizes where the mine count would fill every cell, since
 * resample-on-collision placement could then never finish.
 */
export function checkDimensions(width: number, height: number, curve: DensityCurve): number {
  checkSize(width, height);
  const area = width * height;
  const mines = mineCountForArea(area, curve);
  if (mines < 0 || mines >= area) {
    throw invalidDimensions(`${mines} mines do not fit a ${width}x${height} board`);
  }
  return mines;
}

export function createGrid(width: number, height: number): CellState[] {
  const grid: CellState[] = [];
  for (let i = 0; i < width * height; i++) grid.push(unknown(false));
  return grid;
}

/** Ground truth, whatever the wrapper. */
export function hasMine(cell: CellState): boolean {
  return cell.kind !== "counted" && cell.mined;
}

// Pick a uniform random index, retry on collision, until `mines` cells are mined.
export function placeMines(grid: CellState[], mines: number, rng: RandomSource): void {
  for (let placed = 0; placed < mines; placed++) {
    let i = randomIndex(rng, grid.length);
    while (hasMine(grid[i])) {
      i = randomIndex(rng, grid.length);
    }
    grid[i] = unknown(true);
  }
}

export function stampMines(grid: CellState[], mines: readonly Pos[], width: number, height: number): void {
  for (const { x, y } of mines) {
    if (!inBounds(x, y, width, height)) {
      throw invalidLayout(`(${x}, ${y}) is outside the ${width}x${height} board`);
    }
    const i = cellIndex(x, y, width);
    if (hasMine(grid[i])) {
      throw invalidLayout(`(${x}, ${y}) is listed more than once`);
    }
    grid[i] = unknown(true);
  }
}

// A neighbour's mark never hides its mine from the count.
export function neighbourMineCount(
  grid: readonly CellState[],
  x: number,
  y: number,
  width: number,
  height: number,
): number {
  let count = 0;
  for (const n of neighbours(x, y, width, height)) {
    if (hasMine(grid[cellIndex(n.x, n.y, width)])) count++;
  }
  return count;
}
