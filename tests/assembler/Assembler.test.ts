import assert from "node:assert";
import { describe, test } from "node:test";

import {
  assemble,
  assembleLine,
  assembleProgram,
  encodeIType,
  encodeRType,
} from "../../src/core/assembler/Assembler";
import { disassembleInstruction } from "../../src/core/debugger/Disassembler";
import { AssemblerError } from "../../src/core/exceptions/SimulationExceptions";

describe("Assembler", () => {
  test("encodes register and immediate forms bit-exactly", () => {
    assert.strictEqual(encodeRType({ rs: 1, rt: 2, rd: 3, funct: 0x20 }), 0x00221820);
    assert.strictEqual(encodeRType({ rs: 1, rt: 2, rd: 3, shamt: 5, funct: 0 }), 0x00221940);
    assert.strictEqual(encodeIType({ opcode: 0x04, rs: 1, rt: 2, immediate: -3 }), 0x1022fffd);
    assert.strictEqual(encodeIType({ opcode: 0x2b, rs: 0, rt: 1, immediate: 0xffff }), 0xac01ffff);
  });

  test("assembles each supported mnemonic", () => {
    assert.strictEqual(assembleLine("ADD R3, R1, R2"), 0x00221820);
    assert.strictEqual(assembleLine("sub r3, r1, r2"), 0x00221822);
    assert.strictEqual(assembleLine("SLT $r3, $r1, $r2"), 0x0022182a);
    assert.strictEqual(assembleLine("ADDI R1, R0, 10"), 0x2001000a);
    assert.strictEqual(assembleLine("ADDI R1, R0, 0xA"), 0x2001000a);
    assert.strictEqual(assembleLine("BEQ R1, R2, -3"), 0x1022fffd);
    assert.strictEqual(assembleLine("LW R2, 4(R0)"), 0x8c020004);
    assert.strictEqual(assembleLine("SW R1, -1(R0)"), 0xac01ffff);
  });

  test("accepts bracketed memory operands", () => {
    assert.strictEqual(assembleLine("SW R1,[R0+0]"), assembleLine("SW R1, 0(R0)"));
    assert.strictEqual(assembleLine("LW R2, [R0 + 4]"), 0x8c020004);
    assert.strictEqual(assembleLine("SW R1, [R0-1]"), 0xac01ffff);
    assert.strictEqual(assembleLine("LW R2, [R0]"), 0x8c020000);
  });

  test("returns null for blank and comment-only lines", () => {
    assert.strictEqual(assembleLine(""), null);
    assert.strictEqual(assembleLine("   # note"), null);
    assert.strictEqual(assembleLine("; note"), null);
  });

  test("round-trips through the disassembler", () => {
    const source = ["ADD R3, R1, R2", "ADDI R31, R30, -32768", "BEQ R0, R0, 255", "LW R7, 12(R4)", "SW R2, 35(R0)"];

    source.forEach((line) => {
      const word = assembleLine(line);
      assert.ok(word !== null);
      assert.strictEqual(disassembleInstruction(word).assembly, line);
    });
  });

  test("lays a program out from a base address", () => {
    const entries = assembleProgram("ADDI R1, R0, 10\n# comment\nADDI R2, R0, 20\n", 4);

    assert.deepStrictEqual(entries, [
      { address: 4, value: 0x2001000a, kind: "instruction" },
      { address: 5, value: 0x20020014, kind: "instruction" },
    ]);
    assert.deepStrictEqual(assemble("ADD R3, R1, R2\n\nSUB R3, R1, R2"), [0x00221820, 0x00221822]);
  });

  test("rejects programs that overflow the address space", () => {
    assert.throws(() => assembleProgram("ADD R1, R1, R1\nADD R1, R1, R1", 255), RangeError);
  });

  test("reports malformed source with its line number", () => {
    assert.throws(
      () => assemble("ADD R1, R2, R3\nMUL R1, R2, R3"),
      (error: unknown) => error instanceof AssemblerError && error.line === 2 && error.message.includes("MUL"),
    );
    assert.throws(() => assembleLine("ADD R1, R2"), AssemblerError);
    assert.throws(() => assembleLine("ADD R1, R2, R32"), AssemblerError);
    assert.throws(() => assembleLine("ADDI R1, R0, 70000"), AssemblerError);
    assert.throws(() => assembleLine("ADDI R1, R0, ten"), AssemblerError);
    assert.throws(() => assembleLine("LW R1, R0"), AssemblerError);
  });
});
