import path from "node:path";

import { attachTracePrinter, createEngine, formatRunReport } from "../src/core";

const USAGE = "usage: run-program <instructions-file> [data-file] [numSets] [blocksPerSet]";

function parsePositiveInteger(value: string | undefined, fallback: number, label: string): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new RangeError(`${label} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

function main(argv: string[]): number {
  const [instructionsFile, dataFile, numSets, blocksPerSet] = argv;
  if (!instructionsFile) {
    console.error(USAGE);
    return 2;
  }

  const engine = createEngine({
    cache: {
      numSets: parsePositiveInteger(numSets, 4, "numSets"),
      blocksPerSet: parsePositiveInteger(blocksPerSet, 2, "blocksPerSet"),
    },
  });

  const warn = (message: string): void => console.error(message);
  if (dataFile) {
    engine.loadFile(path.resolve(dataFile), { kind: "data", warn });
  }
  engine.loadFile(path.resolve(instructionsFile), { kind: "instruction", warn });

  const detach = attachTracePrinter(engine.getTrace());
  engine.run();
  detach();

  formatRunReport(engine.getSnapshot()).forEach((line) => console.log(line));
  return engine.isHalted() ? 0 : 1;
}

process.exitCode = main(process.argv.slice(2));
