import { decodeInstruction, OPCODES } from "../cpu/Instructions";

export interface DisassembledInstruction {
  mnemonic: string;
  operands: string[];
  assembly: string;
}

const formatRegister = (registerIndex: number): string => `R${registerIndex}`;

const formatHex = (value: number): string => `0x${value.toString(16).toUpperCase()}`;

const build = (mnemonic: string, operands: string[]): DisassembledInstruction => ({
  mnemonic,
  operands,
  assembly: operands.length > 0 ? `${mnemonic} ${operands.join(", ")}` : mnemonic,
});

export function disassembleInstruction(instruction: number): DisassembledInstruction {
  const decoded = decodeInstruction(instruction);
  const { rs, rt, rd } = decoded.fields;

  switch (decoded.mnemonic) {
    case "add":
    case "sub":
    case "slt":
      return build(decoded.mnemonic.toUpperCase(), [formatRegister(rd), formatRegister(rs), formatRegister(rt)]);
    case "addi":
      return build("ADDI", [formatRegister(rt), formatRegister(rs), `${decoded.offset}`]);
    case "beq":
      return build("BEQ", [formatRegister(rs), formatRegister(rt), `${decoded.offset}`]);
    case "lw":
    case "sw":
      return build(decoded.mnemonic.toUpperCase(), [formatRegister(rt), `${decoded.offset}(${formatRegister(rs)})`]);
    case "unknown":
      return decoded.opcode === OPCODES.SPECIAL
        ? build("R-type", [formatHex(decoded.funct)])
        : build("Unknown", [formatHex(decoded.opcode)]);
  }
}
