import { assembleProgram } from "./assembler/Assembler";
import { Cpu, type StepResult } from "./cpu/Cpu";
import { Cache, DEFAULT_CACHE_CONFIG, type CacheConfig, type CacheSetSnapshot } from "./memory/Caches";
import { Memory, type MemoryEntry } from "./memory/Memory";
import { ProgramLoader, type ProgramImage, type ProgramLoadOptions } from "./loader/ProgramLoader";
import { MachineState } from "./state/MachineState";
import { TraceChannel } from "./tools/traceEvents";

export * from "./assembler/Assembler";
export * from "./cpu/Cpu";
export * from "./cpu/Instructions";
export * from "./debugger/Disassembler";
export * from "./exceptions/SimulationExceptions";
export * from "./loader/ProgramLoader";
export * from "./memory/Caches";
export * from "./memory/Memory";
export * from "./state/MachineState";
export * from "./tools/runReport";
export * from "./tools/traceEvents";

export const DEFAULT_RUN_LIMIT = 1024;

export interface CoreEngineOptions {
  cache?: CacheConfig;
  memory?: Memory;
  state?: MachineState;
  trace?: TraceChannel;
}

export interface SimulationSnapshot {
  pc: number;
  cycle: number;
  halted: boolean;
  registers: number[];
  cache: {
    hits: number;
    misses: number;
    hitRate: number;
    sets: CacheSetSnapshot[];
  };
  memory: MemoryEntry[];
}

/**
 * One simulation run: register file, backing memory, cache and trace channel
 * owned together. Drivers hold an engine and call `step`; nothing here is
 * shared between engines.
 */
export class CoreEngine {
  private readonly memory: Memory;
  private readonly state: MachineState;
  private readonly trace: TraceChannel;
  private readonly cache: Cache;
  private readonly loader: ProgramLoader;
  private readonly cpu: Cpu;

  constructor(options: CoreEngineOptions = {}) {
    this.memory = options.memory ?? new Memory();
    this.state = options.state ?? new MachineState();
    this.trace = options.trace ?? new TraceChannel();
    this.cache = new Cache(options.cache ?? DEFAULT_CACHE_CONFIG);
    this.loader = new ProgramLoader(this.memory);
    this.cpu = new Cpu({ state: this.state, trace: this.trace });
  }

  /** Loads entries on top of a fresh machine unless `clearMemory` is false. */
  load(image: ProgramImage | MemoryEntry[], options: Pick<ProgramLoadOptions, "clearMemory"> = {}): void {
    if (options.clearMemory ?? true) {
      this.reset();
    } else {
      this.resetMachine();
    }
    this.loader.load(image);
  }

  /**
   * Parses and loads one text image without clearing memory, so an
   * instruction image and a data image can be layered.
   */
  loadText(text: string, options: ProgramLoadOptions = {}): ProgramImage {
    this.resetMachine();
    return this.loader.loadText(text, { ...options, clearMemory: false });
  }

  loadFile(path: string, options: ProgramLoadOptions = {}): ProgramImage {
    this.resetMachine();
    return this.loader.loadFile(path, { ...options, clearMemory: false });
  }

  step(): StepResult {
    return this.cpu.step(this.memory, this.cache);
  }

  /** Steps until halted or `maxSteps` instructions have run; returns the number executed. */
  run(maxSteps = DEFAULT_RUN_LIMIT): number {
    let steps = 0;
    while (steps < maxSteps && this.step() !== null) {
      steps += 1;
    }
    return steps;
  }

  /** Fresh memory, cache and machine state. */
  reset(): void {
    this.memory.reset();
    this.resetMachine();
  }

  getState(): MachineState {
    return this.state;
  }

  getMemory(): Memory {
    return this.memory;
  }

  getCache(): Cache {
    return this.cache;
  }

  getTrace(): TraceChannel {
    return this.trace;
  }

  isHalted(): boolean {
    return this.state.isHalted();
  }

  getSnapshot(): SimulationSnapshot {
    const { hits, misses } = this.cache.getStats();
    return {
      pc: this.state.getProgramCounter(),
      cycle: this.state.getCycleCount(),
      halted: this.state.isHalted(),
      registers: this.state.getRegisters(),
      cache: { hits, misses, hitRate: this.cache.getHitRate(), sets: this.cache.getSets() },
      memory: this.memory.entries(),
    };
  }

  private resetMachine(): void {
    this.cache.reset();
    this.state.reset();
    this.trace.clear();
  }
}

export function createEngine(options: CoreEngineOptions = {}): CoreEngine {
  return new CoreEngine(options);
}

export function assembleAndLoad(
  source: string,
  options: CoreEngineOptions & { base?: number } = {},
): { entries: MemoryEntry[]; engine: CoreEngine } {
  const { base, ...engineOptions } = options;
  const entries = assembleProgram(source, base);
  const engine = new CoreEngine(engineOptions);
  engine.load(entries);
  return { entries, engine };
}
