import type { SimulationSnapshot } from "../index";

const hex2 = (value: number): string => `0x${value.toString(16).toUpperCase().padStart(2, "0")}`;

/** Multi-line end-of-run summary: PC, cycles, non-zero registers and cache counters. */
export function formatRunReport(snapshot: SimulationSnapshot): string[] {
  const lines = [
    `PC: ${hex2(snapshot.pc)}${snapshot.halted ? " (halted)" : ""}`,
    `Cycles: ${snapshot.cycle}`,
    "Registers:",
  ];

  snapshot.registers.forEach((value, index) => {
    if (value !== 0) {
      lines.push(`  R${index}: ${value}`);
    }
  });

  const { hits, misses, hitRate } = snapshot.cache;
  lines.push(`Cache: ${hits} hits, ${misses} misses, hit rate ${(hitRate * 100).toFixed(2)}%`);
  return lines;
}
