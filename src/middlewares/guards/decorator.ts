/**
 * Purpose: Attach guard metadata to command classes.
 * Context: Read by the guard middleware before command execution.
 * Invariants:
 * - Metadata is stored on the command prototype (`__guard`).
 * - The guard middleware must read the same shape.
 * Gotchas:
 * - A command that is wrapped or proxied may lose its metadata.
 */

export interface GuardMetadata {
  /** true when the command must run inside a guild. */
  guildOnly?: boolean;
}

/**
 * Decorator that attaches guard configuration to a command class.
 *
 * Side effects: defines `__guard` on the command prototype.
 */
export function Guard(metadata: GuardMetadata) {
  return <T extends abstract new (...args: never[]) => object>(target: T): T => {
    Object.defineProperty(target.prototype, "__guard", {
      value: metadata,
      enumerable: false,
      configurable: true,
    });
    return target;
  };
}

const isGuardMetadata = (value: unknown): value is GuardMetadata =>
  typeof value === "object" &&
  value !== null &&
  (!("guildOnly" in value) || typeof value.guildOnly === "boolean");

/**
 * Read guard metadata from a command instance.
 *
 * Returns: GuardMetadata or null when not configured.
 */
export function getGuardMetadata(command: unknown): GuardMetadata | null {
  if (typeof command !== "object" || command === null || !("__guard" in command)) {
    return null;
  }
  const metadata: unknown = command.__guard;
  return isGuardMetadata(metadata) ? metadata : null;
}
