// Bit layout and classification of the 32-bit instruction word.
//
//   31    26 25  21 20  16 15  11 10   6 5    0
//  | opcode |  rs  |  rt  |  rd  | shamt| funct |
//                         |     immediate       |

export const OPCODES = {
  SPECIAL: 0x00,
  BEQ: 0x04,
  ADDI: 0x08,
  LW: 0x23,
  SW: 0x2b,
} as const;

export const FUNCTS = {
  ADD: 0x20,
  SUB: 0x22,
  SLT: 0x2a,
} as const;

export interface InstructionFields {
  opcode: number;
  rs: number;
  rt: number;
  rd: number;
  shamt: number;
  funct: number;
  immediate: number;
}

export type RegisterMnemonic = "add" | "sub" | "slt";
export type ImmediateMnemonic = "addi" | "beq" | "lw" | "sw";

export interface RegisterInstruction {
  mnemonic: RegisterMnemonic;
  fields: InstructionFields;
}

export interface ImmediateInstruction {
  mnemonic: ImmediateMnemonic;
  fields: InstructionFields;
  /** Immediate sign-extended from 16 bits. */
  offset: number;
}

/** Any opcode/funct combination outside the supported set. */
export interface UnknownInstruction {
  mnemonic: "unknown";
  fields: InstructionFields;
  opcode: number;
  funct: number;
}

export type DecodedInstruction = RegisterInstruction | ImmediateInstruction | UnknownInstruction;

export function signExtend16(value: number): number {
  return (value << 16) >> 16;
}

export function decodeFields(instruction: number): InstructionFields {
  return {
    opcode: (instruction >>> 26) & 0x3f,
    rs: (instruction >>> 21) & 0x1f,
    rt: (instruction >>> 16) & 0x1f,
    rd: (instruction >>> 11) & 0x1f,
    shamt: (instruction >>> 6) & 0x1f,
    funct: instruction & 0x3f,
    immediate: instruction & 0xffff,
  };
}

const REGISTER_FUNCTS: ReadonlyMap<number, RegisterMnemonic> = new Map([
  [FUNCTS.ADD, "add"],
  [FUNCTS.SUB, "sub"],
  [FUNCTS.SLT, "slt"],
]);

const IMMEDIATE_OPCODES: ReadonlyMap<number, ImmediateMnemonic> = new Map([
  [OPCODES.ADDI, "addi"],
  [OPCODES.BEQ, "beq"],
  [OPCODES.LW, "lw"],
  [OPCODES.SW, "sw"],
]);

/** Never throws: every 32-bit word decodes to some variant. */
export function decodeInstruction(instruction: number): DecodedInstruction {
  const fields = decodeFields(instruction);
  const unknown: UnknownInstruction = { mnemonic: "unknown", fields, opcode: fields.opcode, funct: fields.funct };

  if (fields.opcode === OPCODES.SPECIAL) {
    const mnemonic = REGISTER_FUNCTS.get(fields.funct);
    return mnemonic ? { mnemonic, fields } : unknown;
  }

  const mnemonic = IMMEDIATE_OPCODES.get(fields.opcode);
  return mnemonic ? { mnemonic, fields, offset: signExtend16(fields.immediate) } : unknown;
}
