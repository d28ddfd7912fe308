// Single-cycle execution engine: fetch from backing memory, decode, execute,
// then commit register/PC updates. Loads and stores go through the cache
// before (LW) or alongside (SW) backing memory.

import { Cache } from "../memory/Caches";
import { Memory } from "../memory/Memory";
import { ADDRESS_MASK, MachineState } from "../state/MachineState";
import { disassembleInstruction } from "../debugger/Disassembler";
import { decodeInstruction, type DecodedInstruction, type ImmediateInstruction } from "./Instructions";
import { TraceChannel, type LoadSource, type TraceEffect, type TraceRecord } from "../tools/traceEvents";

export type StepResult = TraceRecord | null;

export interface CpuOptions {
  state?: MachineState;
  trace?: TraceChannel;
}

const toInt32 = (value: number): number => value | 0;

export class Cpu {
  private readonly state: MachineState;
  private readonly trace: TraceChannel;

  constructor(options: CpuOptions = {}) {
    this.state = options.state ?? new MachineState();
    this.trace = options.trace ?? new TraceChannel();
  }

  getState(): MachineState {
    return this.state;
  }

  getTrace(): TraceChannel {
    return this.trace;
  }

  /** Executes one instruction. Returns null without touching anything once halted. */
  step(memory: Memory, cache: Cache): StepResult {
    if (this.state.isHalted()) {
      return null;
    }

    const pc = this.state.getProgramCounter();
    // An unmapped fetch reads as word 0, an unsupported R-type.
    const word = memory.read(pc) ?? 0;
    const decoded = decodeInstruction(word);
    const effect = this.execute(decoded, memory, cache);

    this.state.incrementCycleCount();
    const nextPc = this.state.getProgramCounter();
    if (!memory.has(nextPc)) {
      this.state.halt();
    }

    const record: TraceRecord = {
      cycle: this.state.getCycleCount(),
      pc,
      nextPc,
      word,
      assembly: disassembleInstruction(word).assembly,
      decoded,
      effect,
      halted: this.state.isHalted(),
    };
    this.trace.publish(record);
    return record;
  }

  private execute(decoded: DecodedInstruction, memory: Memory, cache: Cache): TraceEffect {
    const { rs, rt, rd } = decoded.fields;
    const state = this.state;

    switch (decoded.mnemonic) {
      case "add":
        return this.writeRegister(rd, state.getRegister(rs) + state.getRegister(rt));
      case "sub":
        return this.writeRegister(rd, state.getRegister(rs) - state.getRegister(rt));
      case "slt":
        return this.writeRegister(rd, toInt32(state.getRegister(rs)) < toInt32(state.getRegister(rt)) ? 1 : 0);
      case "addi":
        return this.writeRegister(rt, state.getRegister(rs) + decoded.offset);
      case "beq":
        return this.branchIfEqual(decoded);
      case "lw":
        return this.loadWord(decoded, memory, cache);
      case "sw":
        return this.storeWord(decoded, memory, cache);
      case "unknown":
        state.incrementProgramCounter();
        return { type: "unsupported", opcode: decoded.opcode, funct: decoded.funct };
    }
  }

  private writeRegister(register: number, value: number): TraceEffect {
    this.state.setRegister(register, value);
    this.state.incrementProgramCounter();
    return { type: "register-write", register, value: this.state.getRegister(register) };
  }

  private branchIfEqual(decoded: ImmediateInstruction): TraceEffect {
    const { rs, rt } = decoded.fields;
    const pc = this.state.getProgramCounter();
    const taken = this.state.getRegister(rs) === this.state.getRegister(rt);

    // Backward offsets go through signed arithmetic and are truncated to 8 bits;
    // forward offsets wrap as unsigned 8-bit adds of the truncated immediate.
    const target =
      decoded.offset < 0
        ? (pc + 1 + decoded.offset) & ADDRESS_MASK
        : (((pc + 1) & ADDRESS_MASK) + (decoded.offset & ADDRESS_MASK)) & ADDRESS_MASK;

    if (taken) {
      this.state.setProgramCounter(target);
    } else {
      this.state.incrementProgramCounter();
    }
    return { type: "branch", taken, target };
  }

  private effectiveAddress(decoded: ImmediateInstruction): number {
    return (this.state.getRegister(decoded.fields.rs) + decoded.offset) & ADDRESS_MASK;
  }

  private loadWord(decoded: ImmediateInstruction, memory: Memory, cache: Cache): TraceEffect {
    const register = decoded.fields.rt;
    const address = this.effectiveAddress(decoded);
    const cached = cache.read(address);

    let value: number;
    let source: LoadSource;
    if (cached.hit) {
      value = cached.data;
      source = "cache";
    } else {
      const stored = memory.read(address);
      if (stored === undefined) {
        memory.write(address, 0, "data");
        value = 0;
        source = "zero-fill";
      } else {
        value = stored;
        source = "memory";
      }
      cache.write(address, value);
    }

    this.state.setRegister(register, value);
    this.state.incrementProgramCounter();
    return { type: "load", register, address, value, hit: cached.hit, source };
  }

  private storeWord(decoded: ImmediateInstruction, memory: Memory, cache: Cache): TraceEffect {
    const register = decoded.fields.rt;
    const address = this.effectiveAddress(decoded);
    const value = this.state.getRegister(register);

    memory.write(address, value, "data");
    cache.write(address, value);
    this.state.incrementProgramCounter();
    return { type: "store", register, address, value };
  }
}
