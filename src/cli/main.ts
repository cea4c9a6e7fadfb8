import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { BoardError, Game, createRng } from "../engine/index";
import { HELP, applyCommand, parseCommand, statusLine } from "./commands";
import { readCliConfig } from "./config";

async function main(): Promise<void> {
  const config = readCliConfig(process.argv.slice(2));
  const game = new Game(config.width, config.height, {
    random: config.seed === undefined ? Math.random : createRng(config.seed),
    detectWin: config.detectWin,
  });

  console.log(HELP);
  const rl = createInterface({ input, output });
  try {
    for (;;) {
      console.log(`\n${game.toString()}\n${statusLine(game)}`);
      const line = await rl.question("> ");
      const command = parseCommand(line);
      if (!command) {
        console.warn(`Unrecognised command: "${line.trim()}"`);
        continue;
      }
      if (command.type === "exit") break;
      try {
        console.log(applyCommand(game, command));
      } catch (err) {
        if (!(err instanceof BoardError)) throw err;
        console.error(err.message);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
