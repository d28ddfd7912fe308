import { type DecodedInstruction } from "../cpu/Instructions";

export type LoadSource = "cache" | "memory" | "zero-fill";

export type TraceEffect =
  | { type: "register-write"; register: number; value: number }
  | { type: "branch"; taken: boolean; target: number }
  | { type: "load"; register: number; address: number; value: number; hit: boolean; source: LoadSource }
  | { type: "store"; register: number; address: number; value: number }
  | { type: "unsupported"; opcode: number; funct: number };

export interface TraceRecord {
  /** Cycle count after the instruction committed. */
  cycle: number;
  pc: number;
  nextPc: number;
  word: number;
  assembly: string;
  decoded: DecodedInstruction;
  effect: TraceEffect;
  halted: boolean;
}

export type TraceListener = (record: TraceRecord) => void;

export const DEFAULT_TRACE_HISTORY = 256;

const hex2 = (value: number): string => `0x${value.toString(16).toUpperCase().padStart(2, "0")}`;

export function formatTraceRecord(record: TraceRecord): string {
  const prefix = `[${record.cycle}] ${hex2(record.pc)} ${record.assembly}`;
  const { effect } = record;

  switch (effect.type) {
    case "register-write":
      return `${prefix} -> R${effect.register} = ${effect.value}`;
    case "branch":
      return `${prefix} -> ${effect.taken ? "taken" : "not taken"}, PC = ${hex2(record.nextPc)}`;
    case "load":
      return `${prefix} -> ${effect.hit ? "HIT" : "MISS"} ${hex2(effect.address)} (${effect.source}), R${effect.register} = ${effect.value}`;
    case "store":
      return `${prefix} -> MEM[${hex2(effect.address)}] = ${effect.value}`;
    case "unsupported":
      return `${prefix} -> unsupported (opcode ${hex2(effect.opcode)}, funct ${hex2(effect.funct)})`;
  }
}

/**
 * Per-engine channel of executed-instruction records. Keeps a bounded
 * history so late subscribers and display layers can inspect recent steps.
 */
export class TraceChannel {
  private readonly listeners = new Set<TraceListener>();
  private readonly history: TraceRecord[] = [];

  constructor(private readonly historyLimit = DEFAULT_TRACE_HISTORY) {}

  publish(record: TraceRecord): void {
    if (this.historyLimit > 0) {
      this.history.push(record);
      if (this.history.length > this.historyLimit) {
        this.history.shift();
      }
    }
    this.listeners.forEach((listener) => listener(record));
  }

  subscribe(listener: TraceListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  getHistory(): TraceRecord[] {
    return [...this.history];
  }

  getLatest(): TraceRecord | null {
    return this.history[this.history.length - 1] ?? null;
  }

  clear(): void {
    this.history.length = 0;
  }

  hasListeners(): boolean {
    return this.listeners.size > 0;
  }
}

/** Subscribes a sink that prints one formatted line per executed instruction. */
export function attachTracePrinter(channel: TraceChannel, sink: (message: string) => void = console.log): () => void {
  return channel.subscribe((record) => sink(formatTraceRecord(record)));
}
