import { parseArgs } from "node:util";
import { BOARD_LEVELS, BoardLevel, isBoardLevel } from "../engine/index";

export interface CliConfig {
  width: number;
  height: number;
  level?: BoardLevel;
  seed?: number;
  detectWin: boolean;
}

export const DEFAULT_CLI_CONFIG: CliConfig = {
  width: 10,
  height: 5,
  level: undefined,
  seed: undefined,
  detectWin: false,
};

function parseInteger(name: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new Error(`--${name} expects an integer, got "${value}"`);
  }
  return n;
}

function parseLevel(value: string | undefined): BoardLevel | undefined {
  if (value === undefined) return undefined;
  if (!isBoardLevel(value)) {
    const known = Object.keys(BOARD_LEVELS).join(", ");
    throw new Error(`--level expects one of ${known}, got "${value}"`);
  }
  return value;
}

// --level picks the size; --width and --height override it.
export function readCliConfig(argv: string[]): CliConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      width: { type: "string", short: "w" },
      height: { type: "string" },
      level: { type: "string", short: "l" },
      seed: { type: "string", short: "s" },
      "detect-win": { type: "boolean" },
    },
  });

  const level = parseLevel(values.level);
  const size = level ? BOARD_LEVELS[level] : DEFAULT_CLI_CONFIG;

  return {
    width: values.width === undefined ? size.width : parseInteger("width", values.width),
    height: values.height === undefined ? size.height : parseInteger("height", values.height),
    level,
    seed: values.seed === undefined ? DEFAULT_CLI_CONFIG.seed : parseInteger("seed", values.seed),
    detectWin: values["detect-win"] ?? DEFAULT_CLI_CONFIG.detectWin,
  };
}
