import { ConfigurationError } from "../exceptions/SimulationExceptions";
import { ADDRESS_SPACE_SIZE } from "../state/MachineState";

export type WordKind = "instruction" | "data";

export interface MemoryEntry {
  address: number;
  value: number;
  kind: WordKind;
}

const MAX_WORD = 0xffffffff;

/**
 * Sparse word-addressed backing store. Each occupied address holds one 32-bit
 * word and is tagged as either an instruction or a data word; unoccupied
 * addresses have neither.
 */
export class Memory {
  private readonly words = new Map<number, number>();
  private readonly kinds = new Map<number, WordKind>();

  get size(): number {
    return this.words.size;
  }

  reset(): void {
    this.words.clear();
    this.kinds.clear();
  }

  has(address: number): boolean {
    return this.words.has(address);
  }

  read(address: number): number | undefined {
    return this.words.get(address);
  }

  getKind(address: number): WordKind | undefined {
    return this.kinds.get(address);
  }

  write(address: number, value: number, kind: WordKind = "data"): void {
    const normalizedAddress = this.validateAddress(address);
    if (!Number.isInteger(value) || value < 0 || value > MAX_WORD) {
      throw new ConfigurationError(`Word value out of range: ${value}`);
    }

    this.words.set(normalizedAddress, value >>> 0);
    this.kinds.set(normalizedAddress, kind);
  }

  load(entries: Iterable<MemoryEntry>): void {
    for (const entry of entries) {
      this.write(entry.address, entry.value, entry.kind);
    }
  }

  /**
   * Returns every occupied address sorted ascending. Intended for display
   * layers that need a read-only view of the store.
   */
  entries(): MemoryEntry[] {
    return [...this.words.keys()]
      .sort((a, b) => a - b)
      .map((address) => ({
        address,
        value: this.words.get(address) ?? 0,
        kind: this.kinds.get(address) ?? "data",
      }));
  }

  private validateAddress(address: number): number {
    if (!Number.isInteger(address) || address < 0 || address >= ADDRESS_SPACE_SIZE) {
      throw new ConfigurationError(`Invalid memory address: ${address}`);
    }
    return address;
  }
}
