/**
 * Configuration entrypoint.
 *
 * Re-exports the environment schema, the cached process config and the env keys.
 * Prefer `import { getBotConfig } from "@/configuration"` over the submodules.
 */
export * from "./constants";
export * from "./env";
