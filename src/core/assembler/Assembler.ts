import { AssemblerError } from "../exceptions/SimulationExceptions";
import { FUNCTS, OPCODES } from "../cpu/Instructions";
import { type MemoryEntry } from "../memory/Memory";
import { ADDRESS_SPACE_SIZE } from "../state/MachineState";

export interface RTypeOperands {
  rs: number;
  rt: number;
  rd: number;
  shamt?: number;
  funct: number;
}

export interface ITypeOperands {
  opcode: number;
  rs: number;
  rt: number;
  immediate: number;
}

export function encodeRType({ rs, rt, rd, shamt = 0, funct }: RTypeOperands): number {
  return (
    ((OPCODES.SPECIAL << 26) | ((rs & 0x1f) << 21) | ((rt & 0x1f) << 16) | ((rd & 0x1f) << 11) | ((shamt & 0x1f) << 6) | (funct & 0x3f)) >>>
    0
  );
}

export function encodeIType({ opcode, rs, rt, immediate }: ITypeOperands): number {
  return (((opcode & 0x3f) << 26) | ((rs & 0x1f) << 21) | ((rt & 0x1f) << 16) | (immediate & 0xffff)) >>> 0;
}

const REGISTER_PATTERN = /^\$?r(\d{1,2})$/i;
const BRACKET_MEMORY = /^\[\s*([^\]+-]+?)\s*(?:([+-])\s*([^\]]+?))?\s*\]$/;
const OFFSET_MEMORY = /^([^()]*)\(\s*([^)]+?)\s*\)$/;

interface LineContext {
  line: number;
  text: string;
}

function fail(context: LineContext, message: string): never {
  throw new AssemblerError(message, context.line, context.text);
}

function parseRegister(token: string, context: LineContext): number {
  const match = REGISTER_PATTERN.exec(token.trim());
  const index = match ? Number.parseInt(match[1], 10) : Number.NaN;
  if (!Number.isInteger(index) || index < 0 || index > 31) {
    fail(context, `Invalid register '${token.trim()}'`);
  }
  return index;
}

function parseImmediate(token: string, context: LineContext): number {
  const trimmed = token.trim();
  const negative = trimmed.startsWith("-");
  const magnitude = negative || trimmed.startsWith("+") ? trimmed.slice(1) : trimmed;
  const value = /^0x[0-9a-f]+$/i.test(magnitude)
    ? Number.parseInt(magnitude.slice(2), 16)
    : /^\d+$/.test(magnitude)
      ? Number.parseInt(magnitude, 10)
      : Number.NaN;

  if (Number.isNaN(value)) {
    fail(context, `Invalid immediate '${trimmed}'`);
  }

  const signed = negative ? -value : value;
  if (signed < -0x8000 || signed > 0xffff) {
    fail(context, `Immediate '${trimmed}' does not fit in 16 bits`);
  }
  return signed;
}

// Accepts both `imm(Rs)` and `[Rs+imm]` forms.
function parseMemoryOperand(token: string, context: LineContext): { rs: number; immediate: number } {
  const trimmed = token.trim();

  const bracket = BRACKET_MEMORY.exec(trimmed);
  if (bracket) {
    const [, base, sign, offset] = bracket;
    const immediate = offset === undefined ? 0 : parseImmediate(`${sign === "-" ? "-" : ""}${offset}`, context);
    return { rs: parseRegister(base, context), immediate };
  }

  const parenthesised = OFFSET_MEMORY.exec(trimmed);
  if (parenthesised) {
    const [, offset, base] = parenthesised;
    const immediate = offset.trim() === "" ? 0 : parseImmediate(offset, context);
    return { rs: parseRegister(base, context), immediate };
  }

  return fail(context, `Invalid memory operand '${trimmed}'`);
}

function expectOperands(operands: string[], count: number, mnemonic: string, context: LineContext): void {
  if (operands.length !== count) {
    fail(context, `${mnemonic} expects ${count} operands, found ${operands.length}`);
  }
}

/**
 * Assembles one line of the textual instruction syntax produced by the
 * disassembler. Returns null for blank and comment-only lines.
 */
export function assembleLine(text: string, line = 1): number | null {
  const context: LineContext = { line, text };
  const code = text.replace(/[#;].*$/, "").trim();
  if (code === "") {
    return null;
  }

  const [mnemonicToken] = code.split(/\s+/, 1);
  const mnemonic = mnemonicToken.toUpperCase();
  const rest = code.slice(mnemonicToken.length).trim();
  const operands = rest === "" ? [] : splitOperands(rest);

  switch (mnemonic) {
    case "ADD":
    case "SUB":
    case "SLT": {
      expectOperands(operands, 3, mnemonic, context);
      const [rd, rs, rt] = operands.map((operand) => parseRegister(operand, context));
      return encodeRType({ rs, rt, rd, funct: FUNCTS[mnemonic] });
    }
    case "ADDI": {
      expectOperands(operands, 3, mnemonic, context);
      return encodeIType({
        opcode: OPCODES.ADDI,
        rt: parseRegister(operands[0], context),
        rs: parseRegister(operands[1], context),
        immediate: parseImmediate(operands[2], context),
      });
    }
    case "BEQ": {
      expectOperands(operands, 3, mnemonic, context);
      return encodeIType({
        opcode: OPCODES.BEQ,
        rs: parseRegister(operands[0], context),
        rt: parseRegister(operands[1], context),
        immediate: parseImmediate(operands[2], context),
      });
    }
    case "LW":
    case "SW": {
      expectOperands(operands, 2, mnemonic, context);
      const { rs, immediate } = parseMemoryOperand(operands[1], context);
      return encodeIType({ opcode: OPCODES[mnemonic], rs, rt: parseRegister(operands[0], context), immediate });
    }
    default:
      return fail(context, `Unknown mnemonic '${mnemonicToken}'`);
  }
}

// Splits on top-level commas only.
function splitOperands(rest: string): string[] {
  const operands: string[] = [];
  let depth = 0;
  let current = "";
  for (const char of rest) {
    if (char === "[" || char === "(") depth += 1;
    if (char === "]" || char === ")") depth -= 1;
    if (char === "," && depth === 0) {
      operands.push(current.trim());
      current = "";
      continue;
    }
    current += char;
  }
  operands.push(current.trim());
  return operands;
}

export function assemble(source: string): number[] {
  const words: number[] = [];
  source.split(/\r?\n/).forEach((text, index) => {
    const word = assembleLine(text, index + 1);
    if (word !== null) {
      words.push(word);
    }
  });
  return words;
}

/** Assembles source into instruction entries laid out from `base` upward. */
export function assembleProgram(source: string, base = 0): MemoryEntry[] {
  const words = assemble(source);
  if (base < 0 || base + words.length > ADDRESS_SPACE_SIZE) {
    throw new RangeError(`Program of ${words.length} words does not fit at base ${base}`);
  }
  return words.map((value, index): MemoryEntry => ({ address: base + index, value, kind: "instruction" }));
}
