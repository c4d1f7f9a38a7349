export function createRunId(now = new Date(), random: () => number = Math.random): string {
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  const suffix = random().toString(36).slice(2, 8).padEnd(6, "0");
  return `scan_${stamp}_${suffix}`;
}
