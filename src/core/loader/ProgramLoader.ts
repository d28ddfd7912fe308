import { readFileSync } from "node:fs";

import { ProgramFormatError } from "../exceptions/SimulationExceptions";
import { Memory, type MemoryEntry, type WordKind } from "../memory/Memory";
import { ADDRESS_SPACE_SIZE } from "../state/MachineState";

export interface ProgramLoadOptions {
  /** Kind tag applied to every parsed word. Defaults to "instruction". */
  kind?: WordKind;
  /** Throw on the first malformed line instead of skipping it. */
  strict?: boolean;
  /** Whether to clear memory before loading. Defaults to false. */
  clearMemory?: boolean;
  /** Receives one warning per skipped line. */
  warn?: (message: string) => void;
}

export interface SkippedLine {
  line: number;
  text: string;
  reason: string;
}

export interface ProgramImage {
  entries: MemoryEntry[];
  skipped: SkippedLine[];
}

const HEX_ADDRESS = /^(?:0x)?([0-9a-f]+)$/i;
const BINARY_WORD = /^[01]{1,32}$/;

function parseLine(text: string): { address: number; value: number } | string {
  const fields = text.trim().split(/\s+/);
  if (fields.length !== 2) {
    return `expected 2 fields, found ${fields.length}`;
  }

  const [addressField, wordField] = fields;
  const addressMatch = HEX_ADDRESS.exec(addressField);
  if (!addressMatch) {
    return `invalid hex address '${addressField}'`;
  }

  const address = Number.parseInt(addressMatch[1], 16);
  if (address >= ADDRESS_SPACE_SIZE) {
    return `address '${addressField}' does not fit in 8 bits`;
  }

  if (!BINARY_WORD.test(wordField)) {
    return `invalid binary word '${wordField}'`;
  }

  return { address, value: Number.parseInt(wordField, 2) >>> 0 };
}

/**
 * Parses the `<hex-address> <binary-word>` text image, one word per line.
 * Later lines for the same address replace earlier ones.
 */
export function parseProgramText(text: string, options: ProgramLoadOptions = {}): ProgramImage {
  const kind = options.kind ?? "instruction";
  const byAddress = new Map<number, MemoryEntry>();
  const skipped: SkippedLine[] = [];

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = index + 1;
    const trimmed = rawLine.trim();
    if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith(";")) {
      return;
    }

    const parsed = parseLine(trimmed);
    if (typeof parsed === "string") {
      if (options.strict) {
        throw new ProgramFormatError(line, rawLine, parsed);
      }
      skipped.push({ line, text: rawLine, reason: parsed });
      options.warn?.(`[ProgramLoader] Skipping line ${line}: ${parsed}`);
      return;
    }

    byAddress.delete(parsed.address);
    byAddress.set(parsed.address, { address: parsed.address, value: parsed.value, kind });
  });

  return { entries: [...byAddress.values()], skipped };
}

export function formatProgramText(entries: Iterable<MemoryEntry>): string {
  return [...entries]
    .map(
      (entry) =>
        `0x${entry.address.toString(16).toUpperCase().padStart(2, "0")} ${(entry.value >>> 0).toString(2).padStart(32, "0")}`,
    )
    .join("\n");
}

export class ProgramLoader {
  constructor(private readonly memory: Memory) {}

  load(image: ProgramImage | MemoryEntry[], options: Pick<ProgramLoadOptions, "clearMemory"> = {}): void {
    if (options.clearMemory ?? false) {
      this.memory.reset();
    }
    this.memory.load(Array.isArray(image) ? image : image.entries);
  }

  loadText(text: string, options: ProgramLoadOptions = {}): ProgramImage {
    const image = parseProgramText(text, options);
    this.load(image, options);
    return image;
  }

  loadFile(path: string, options: ProgramLoadOptions = {}): ProgramImage {
    return this.loadText(readFileSync(path, "utf8"), options);
  }
}
