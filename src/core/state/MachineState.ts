// Register file, program counter and run/halt bookkeeping for the simulated
// processor. Every register is general purpose: register 0 is not wired to
// zero and accepts writes like any other.

export const ADDRESS_SPACE_SIZE = 256;
export const ADDRESS_MASK = ADDRESS_SPACE_SIZE - 1;

export type RunState = "running" | "halted";

export class MachineState {
  static readonly REGISTER_COUNT = 32;

  private readonly registers: Uint32Array;
  private programCounter: number;
  private cycleCount: number;
  private runState: RunState;

  constructor() {
    this.registers = new Uint32Array(MachineState.REGISTER_COUNT);
    this.programCounter = 0;
    this.cycleCount = 0;
    this.runState = "running";
    this.reset();
  }

  reset(): void {
    this.registers.fill(0);
    this.programCounter = 0;
    this.cycleCount = 0;
    this.runState = "running";
  }

  getRegister(index: number): number {
    this.validateRegisterIndex(index);
    return this.registers[index];
  }

  setRegister(index: number, value: number): void {
    this.validateRegisterIndex(index);
    this.registers[index] = value >>> 0;
  }

  /** Copy of the register file, indexed 0–31. */
  getRegisters(): number[] {
    return Array.from(this.registers);
  }

  getProgramCounter(): number {
    return this.programCounter;
  }

  setProgramCounter(value: number): void {
    this.programCounter = value & ADDRESS_MASK;
  }

  incrementProgramCounter(delta = 1): void {
    this.setProgramCounter(this.programCounter + delta);
  }

  getCycleCount(): number {
    return this.cycleCount;
  }

  incrementCycleCount(): void {
    this.cycleCount += 1;
  }

  getRunState(): RunState {
    return this.runState;
  }

  isHalted(): boolean {
    return this.runState === "halted";
  }

  halt(): void {
    this.runState = "halted";
  }

  private validateRegisterIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= MachineState.REGISTER_COUNT) {
      throw new RangeError(`Register index out of bounds: ${index}`);
    }
  }
}
