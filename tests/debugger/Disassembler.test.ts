import assert from "node:assert";
import { describe, test } from "node:test";

import { disassembleInstruction } from "../../src/core/debugger/Disassembler";

describe("disassembleInstruction", () => {
  test("renders register-form instructions as rd, rs, rt", () => {
    assert.deepStrictEqual(disassembleInstruction(0x00221820), {
      mnemonic: "ADD",
      operands: ["R3", "R1", "R2"],
      assembly: "ADD R3, R1, R2",
    });
    assert.strictEqual(disassembleInstruction(0x00221822).assembly, "SUB R3, R1, R2");
    assert.strictEqual(disassembleInstruction(0x0022182a).assembly, "SLT R3, R1, R2");
  });

  test("renders immediates as signed decimals", () => {
    assert.strictEqual(disassembleInstruction(0x2001000a).assembly, "ADDI R1, R0, 10");
    assert.strictEqual(disassembleInstruction(0x2021ffff).assembly, "ADDI R1, R1, -1");
    assert.strictEqual(disassembleInstruction(0x1022fffd).assembly, "BEQ R1, R2, -3");
  });

  test("renders loads and stores as rt, offset(rs)", () => {
    assert.strictEqual(disassembleInstruction(0x8c020004).assembly, "LW R2, 4(R0)");
    assert.strictEqual(disassembleInstruction(0xac01ffff).assembly, "SW R1, -1(R0)");
  });

  test("names unsupported functs and opcodes in upper-case hex", () => {
    assert.strictEqual(disassembleInstruction(0).assembly, "R-type 0x0");
    assert.strictEqual(disassembleInstruction(0x0022182b).assembly, "R-type 0x2B");
    assert.deepStrictEqual(disassembleInstruction(0xfc000000), {
      mnemonic: "Unknown",
      operands: ["0x3F"],
      assembly: "Unknown 0x3F",
    });
  });
});
