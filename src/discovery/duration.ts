const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
  y: 31_536_000_000
};

// Units must appear largest first, each at most once: "1h30m", "15s", "500ms".
const DURATION_RE = /^(?:(\d+)y)?(?:(\d+)w)?(?:(\d+)d)?(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?(?:(\d+)ms)?$/;
const ORDER = ["y", "w", "d", "h", "m", "s", "ms"] as const;

export function isDuration(input: string): boolean {
  return input !== "" && DURATION_RE.test(input);
}

/** Prometheus duration string to milliseconds. */
export function parseDuration(input: string): number {
  const m = input === "" ? null : DURATION_RE.exec(input);
  if (!m) throw new Error(`Invalid duration: "${input}"`);

  let total = 0;
  ORDER.forEach((unit, i) => {
    const part = m[i + 1];
    if (part !== undefined) total += Number(part) * (UNIT_MS[unit] ?? 0);
  });
  return total;
}
