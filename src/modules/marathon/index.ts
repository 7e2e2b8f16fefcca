/**
 * Marathon Module.
 *
 * Purpose: Puzzle marathon domain (roster, attempts, access rules) and its command service.
 */

export * from "./types";
export * from "./errors";
export * from "./elapsed";
export * from "./attempt";
export * from "./access";
export * from "./schema";
export * from "./repository";
export * from "./views";
export * from "./service";
