import { Game, GamePhase } from "../engine/index";

export type Command =
  | { type: "exit" }
  | { type: "restart" }
  | { type: "show-mines" }
  | { type: "uncover"; x: number; y: number }
  | { type: "flag"; x: number; y: number }
  | { type: "question"; x: number; y: number }
  | { type: "clear-mark"; x: number; y: number };

type CellCommand = Extract<Command, { x: number }>["type"];

const CELL_COMMANDS: Record<string, CellCommand> = {
  u: "uncover",
  f: "flag",
  "?": "question",
  c: "clear-mark",
};

export const HELP = `Minefield CLI
----------------------------------------
A small testbed for the board engine.

Commands:
----------------------------------------
x       Exit
r       Restart
m       Show all mines
u[x,y]  Uncover the cell at the coordinates
f[x,y]  Flag a mine at the coordinates
?[x,y]  Mark the cell at the coordinates as uncertain
c[x,y]  Clear the mark at the coordinates`;

const CELL_PATTERN = /^([uf?c])\s*\[\s*(-?\d+)\s*,\s*(-?\d+)\s*\]$/;

export function parseCommand(line: string): Command | null {
  const input = line.trim();
  switch (input) {
    case "x": return { type: "exit" };
    case "r": return { type: "restart" };
    case "m": return { type: "show-mines" };
  }

  const match = CELL_PATTERN.exec(input);
  if (!match) return null;
  const type = CELL_COMMANDS[match[1]];
  return { type, x: parseInt(match[2], 10), y: parseInt(match[3], 10) };
}

/** Runs a command against the game and returns a one-line status. */
export function applyCommand(game: Game, command: Command): string {
  switch (command.type) {
    case "exit":
      return "Bye.";
    case "restart":
      game.reset();
      return "New board.";
    case "show-mines":
      game.showMined();
      return "Mines revealed.";
    case "uncover": {
      const phase = game.uncover(command.x, command.y);
      if (phase === GamePhase.Lost) {
        game.showMined();
        return "Boom! You hit a mine.";
      }
      if (phase === GamePhase.Won) return "All safe cells cleared.";
      return `Uncovered (${command.x}, ${command.y}).`;
    }
    case "flag":
      game.flag(command.x, command.y);
      return `Flagged (${command.x}, ${command.y}).`;
    case "question":
      game.question(command.x, command.y);
      return `Questioned (${command.x}, ${command.y}).`;
    case "clear-mark":
      game.setUnknown(command.x, command.y);
      return `Cleared (${command.x}, ${command.y}).`;
  }
}

export function statusLine(game: Game): string {
  return `Mines left: ${game.remaining()}  State: ${game.state()}`;
}
