import assert from "node:assert";
import path from "node:path";
import { describe, test } from "node:test";

import { ProgramFormatError } from "../../src/core/exceptions/SimulationExceptions";
import { formatProgramText, parseProgramText, ProgramLoader } from "../../src/core/loader/ProgramLoader";
import { Memory } from "../../src/core/memory/Memory";

const SAMPLES = path.join(__dirname, "..", "..", "resources", "samples");

describe("parseProgramText", () => {
  test("reads hex addresses and binary words", () => {
    const image = parseProgramText("0x00 00000000000000000000001010\n0x1F 11111111111111111111111111111111\n");

    assert.deepStrictEqual(image.entries, [
      { address: 0x00, value: 10, kind: "instruction" },
      { address: 0x1f, value: 0xffffffff, kind: "instruction" },
    ]);
    assert.deepStrictEqual(image.skipped, []);
  });

  test("tags entries with the requested kind and accepts addresses without a prefix", () => {
    const image = parseProgramText("20 101", { kind: "data" });

    assert.deepStrictEqual(image.entries, [{ address: 0x20, value: 5, kind: "data" }]);
  });

  test("ignores blank and comment lines", () => {
    const image = parseProgramText("# header\n\n; note\n0x01 1\n");

    assert.deepStrictEqual(image.entries, [{ address: 1, value: 1, kind: "instruction" }]);
    assert.deepStrictEqual(image.skipped, []);
  });

  test("skips malformed lines and reports them to the warning sink", () => {
    const warnings: string[] = [];
    const text = ["0x00 1", "0x01", "0xZZ 1", "0x100 1", "0x02 102", "0x03 1 extra", "0x04 1"].join("\n");

    const image = parseProgramText(text, { warn: (message) => warnings.push(message) });

    assert.deepStrictEqual(
      image.entries.map((entry) => entry.address),
      [0, 4],
    );
    assert.deepStrictEqual(
      image.skipped.map((skip) => skip.line),
      [2, 3, 4, 5, 6],
    );
    assert.strictEqual(warnings.length, 5);
    assert.strictEqual(warnings[0], "[ProgramLoader] Skipping line 2: expected 2 fields, found 1");
    assert.strictEqual(image.skipped[2].reason, "address '0x100' does not fit in 8 bits");
  });

  test("lets later lines overwrite earlier ones for the same address", () => {
    const image = parseProgramText("0x05 1\n0x06 10\n0x05 11");

    assert.deepStrictEqual(image.entries, [
      { address: 6, value: 2, kind: "instruction" },
      { address: 5, value: 3, kind: "instruction" },
    ]);
  });

  test("throws on the first malformed line in strict mode", () => {
    assert.throws(
      () => parseProgramText("0x00 1\nbogus", { strict: true }),
      (error: unknown) => error instanceof ProgramFormatError && error.line === 2 && error.text === "bogus",
    );
  });

  test("formats entries back into the same text layout", () => {
    const text = formatProgramText([
      { address: 0, value: 10, kind: "instruction" },
      { address: 0xab, value: 0x80000000, kind: "data" },
    ]);

    assert.strictEqual(
      text,
      ["0x00 00000000000000000000000000001010", "0xAB 10000000000000000000000000000000"].join("\n"),
    );
    assert.deepStrictEqual(
      parseProgramText(text).entries.map((entry) => entry.value),
      [10, 0x80000000],
    );
  });
});

describe("ProgramLoader", () => {
  test("layers a data image under an instruction image", () => {
    const memory = new Memory();
    const loader = new ProgramLoader(memory);

    loader.loadText("0x00 1\n0x01 10", { kind: "data" });
    loader.loadText("0x00 11");

    assert.deepStrictEqual(memory.entries(), [
      { address: 0, value: 3, kind: "instruction" },
      { address: 1, value: 2, kind: "data" },
    ]);
  });

  test("clears memory first when asked", () => {
    const memory = new Memory();
    memory.write(9, 9);
    const loader = new ProgramLoader(memory);

    loader.load([{ address: 0, value: 1, kind: "instruction" }], { clearMemory: true });

    assert.strictEqual(memory.has(9), false);
    assert.strictEqual(memory.read(0), 1);
  });

  test("loads the sample images from disk", () => {
    const memory = new Memory();
    const loader = new ProgramLoader(memory);

    const instructions = loader.loadFile(path.join(SAMPLES, "sum-array.instructions.txt"));
    const data = loader.loadFile(path.join(SAMPLES, "sum-array.data.txt"), { kind: "data" });

    assert.strictEqual(instructions.entries.length, 9);
    assert.strictEqual(data.entries.length, 3);
    assert.strictEqual(memory.getKind(0x08), "instruction");
    assert.strictEqual(memory.read(0x22), 9);
    assert.strictEqual(memory.getKind(0x22), "data");
  });
});
