/** Names of the environment flags the core reads at module load. */
export type BarkitEnvFlag = "BARKIT_PERF" | "BARKIT_LAYOUT_AUDIT";

/**
 * Read a boolean environment flag. Accepts 1/true/yes/on (case-insensitive);
 * anything else, including an unset variable, is false.
 */
export function readEnvFlag(name: BarkitEnvFlag, env = process.env): boolean {
  const raw = env[name];
  if (raw === undefined) return false;
  const value = raw.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes" || value === "on";
}
