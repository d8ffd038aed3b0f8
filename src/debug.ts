export type DebugFlag = "engine";

export function parseDebugEnv(value: string | undefined = process.env.KERNFORGE_DEBUG) {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;
  for (const entry of value.split(",")) {
    const flag = entry.trim();
    if (!flag) continue;
    if (flag === "engine") flags.add("engine");
  }
  return flags;
}
