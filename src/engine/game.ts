import {
  BOARD_LEVELS,
  BoardLevel,
  CellState,
  DEFAULT_OPTIONS,
  GameOptions,
  GamePhase,
  Pos,
  counted,
  flagged,
  known,
  questioned,
  unknown,
} from "./types";
import {
  cellIndex,
  checkDimensions,
  checkSize,
  createGrid,
  hasMine,
  inBounds,
  neighbourMineCount,
  neighbours,
  placeMines,
  stampMines,
} from "./board";
import { outOfBounds } from "./errors";
import { RandomSource } from "./rng";
import { renderBoard } from "./render";

export class Game {
  readonly width: number;
  readonly height: number;
  readonly options: GameOptions;
  private random: RandomSource;
  private grid: CellState[];
  private phase: GamePhase = GamePhase.Initial;
  private total = 0;
  private remainingCount = 0;

  /**
   * With `mines`, the board uses that fixed layout and never draws from
   * the random source; otherwise it is seeded by the density curve.
   */
  constructor(
    width: number,
    height: number,
    options: Partial<GameOptions> = {},
    mines?: readonly Pos[],
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.random = this.options.random;
    checkSize(width, height);
    this.width = width;
    this.height = height;
    this.grid = createGrid(width, height);
    if (mines) {
      stampMines(this.grid, mines, width, height);
      this.total = mines.length;
      this.remainingCount = mines.length;
    } else {
      this.reset();
    }
  }

  /** A board with a fixed mine layout instead of a random one. */
  static fromMines(
    width: number,
    height: number,
    mines: readonly Pos[],
    options: Partial<GameOptions> = {},
  ): Game {
    return new Game(width, height, options, mines);
  }

  static forLevel(level: BoardLevel, options: Partial<GameOptions> = {}): Game {
    const { width, height } = BOARD_LEVELS[level];
    return new Game(width, height, options);
  }

  // Wipe and re-seed. A new source replaces the current one from here on.
  reset(random?: RandomSource): void {
    if (random) this.random = random;
    const mines = checkDimensions(this.width, this.height, this.options.density);
    this.clear();
    placeMines(this.grid, mines, this.random);
    this.total = mines;
    this.remainingCount = mines;
    this.phase = GamePhase.Initial;
  }

  /** Every cell back to Unknown(false). Mine totals are left alone. */
  clear(): void {
    this.grid = createGrid(this.width, this.height);
    this.phase = GamePhase.Initial;
  }

  state(): GamePhase {
    return this.phase;
  }

  remaining(): number {
    return this.remainingCount;
  }

  get totalMines(): number {
    return this.total;
  }

  cellState(x: number, y: number): CellState {
    return this.grid[this.indexOf(x, y)];
  }

  cells(): readonly CellState[] {
    return this.grid.slice();
  }

  // Only Unknown(true) and Known(true); a flagged or questioned mine reads false.
  isMined(x: number, y: number): boolean {
    const cell = this.grid[this.indexOf(x, y)];
    return (cell.kind === "unknown" || cell.kind === "known") && cell.mined;
  }

  hasMine(x: number, y: number): boolean {
    return hasMine(this.grid[this.indexOf(x, y)]);
  }

  neighborCount(x: number, y: number): number {
    this.indexOf(x, y);
    return neighbourMineCount(this.grid, x, y, this.width, this.height);
  }

  flag(x: number, y: number): void {
    const i = this.indexOf(x, y);
    const cell = this.grid[i];
    if (cell.kind === "unknown" || cell.kind === "questioned") {
      this.grid[i] = flagged(cell.mined);
      if (this.remainingCount > 0) this.remainingCount--;
    }
    this.phase = GamePhase.Playing;
  }

  question(x: number, y: number): void {
    const i = this.indexOf(x, y);
    const cell = this.grid[i];
    if (cell.kind === "unknown") {
      this.grid[i] = questioned(cell.mined);
    } else if (cell.kind === "flagged") {
      this.grid[i] = questioned(cell.mined);
      this.remainingCount++;
    }
    this.phase = GamePhase.Playing;
  }

  setUnknown(x: number, y: number): void {
    const i = this.indexOf(x, y);
    const cell = this.grid[i];
    switch (cell.kind) {
      case "flagged":
        this.grid[i] = unknown(cell.mined);
        this.remainingCount++;
        break;
      case "known":
      case "questioned":
        this.grid[i] = unknown(cell.mined);
        break;
      case "counted":
        this.grid[i] = unknown(false);
        break;
      case "unknown":
        break;
    }
  }

  showMined(): void {
    for (let i = 0; i < this.grid.length; i++) {
      const cell = this.grid[i];
      if (cell.kind === "unknown" && cell.mined) this.grid[i] = known(true);
    }
  }

  uncover(x: number, y: number): GamePhase {
    const i = this.indexOf(x, y);
    if (this.phase === GamePhase.Lost || this.phase === GamePhase.Won) return this.phase;
    this.phase = GamePhase.Playing;

    const cell = this.grid[i];
    if (cell.kind === "known" || cell.kind === "counted") return this.phase;

    if (cell.mined) {
      this.grid[i] = known(true);
      this.phase = GamePhase.Lost;
      return this.phase;
    }

    const count = this.neighborCount(x, y);
    if (count !== 0) {
      this.grid[i] = counted(count);
    } else {
      this.floodReveal(x, y);
    }

    if (this.options.detectWin && this.allSafeRevealed()) {
      this.phase = GamePhase.Won;
    }
    return this.phase;
  }

  toString(): string {
    return renderBoard(this);
  }

  // Zero-count cells open up and push their still-covered safe neighbours;
  // nonzero cells become Counted and stop the spread.
  private floodReveal(x: number, y: number): void {
    const stack: Pos[] = [{ x, y }];
    while (stack.length > 0) {
      const p = stack.pop();
      if (!p) break;
      const i = cellIndex(p.x, p.y, this.width);
      const count = neighbourMineCount(this.grid, p.x, p.y, this.width, this.height);
      if (count !== 0) {
        this.grid[i] = counted(count);
        continue;
      }
      this.grid[i] = known(false);
      for (const n of neighbours(p.x, p.y, this.width, this.height)) {
        const nc = this.grid[cellIndex(n.x, n.y, this.width)];
        if (nc.kind === "unknown" && !nc.mined) stack.push(n);
      }
    }
  }

  private allSafeRevealed(): boolean {
    return !this.grid.some((c) => c.kind !== "known" && c.kind !== "counted" && !c.mined);
  }

  private indexOf(x: number, y: number): number {
    if (!inBounds(x, y, this.width, this.height)) {
      throw outOfBounds(x, y, this.width, this.height);
    }
    return cellIndex(x, y, this.width);
  }
}
