import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parse, stringify } from "yaml";
import type { ZodType, ZodTypeDef } from "zod";
import { createLogger } from "@/utils/logger";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";

const log = createLogger("yaml-store");

let tmpCounter = 0;

/**
 * Generic store for one YAML document on disk, validated with a zod schema.
 *
 * T: the shape callers work with (after the schema's transforms).
 * Raw: the plain, YAML-ready shape written back out.
 *
 * Writes go through a sibling temp file and a rename, so a crash mid-write leaves the
 * previous document in place. There is no locking: two writers race and the last
 * rename wins.
 */
export class YamlStore<T, Raw> {
  constructor(
    readonly path: string,
    protected schema: ZodType<T, ZodTypeDef, unknown>,
    protected serialize: (value: T) => Raw,
    protected emptyValue: () => T,
  ) {}

  /**
   * Read and validate the document. A missing file yields `emptyValue()`.
   */
  async read(): Promise<Result<T, Error>> {
    let text: string;
    try {
      text = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return OkResult(this.emptyValue());
      return ErrResult(toError(error));
    }

    try {
      const raw: unknown = parseYaml(text);
      if (raw === null || raw === undefined) return OkResult(this.emptyValue());

      const parsed = this.schema.safeParse(raw);
      if (!parsed.success) {
        return ErrResult(new Error(`${this.path}: ${describeIssues(parsed.error.issues)}`));
      }
      return OkResult(parsed.data);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  /**
   * Overwrite the document with `value`. On failure the temp file is removed and the
   * previous document stays as it was.
   */
  async write(value: T): Promise<Result<void, Error>> {
    const tmp = `${this.path}.${process.pid}-${++tmpCounter}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmp, stringifyYaml(this.serialize(value)), "utf8");
      await rename(tmp, this.path);
      return OkResult(undefined);
    } catch (error) {
      await rm(tmp, { force: true }).catch((cleanupError: unknown) => {
        log.warn(`could not remove ${tmp}:`, cleanupError);
      });
      return ErrResult(toError(error));
    }
  }
}

/**
 * Parse YAML text. Integers come back as `bigint` so snowflake ids keep every digit;
 * schemas convert them to strings or numbers.
 */
export function parseYaml(text: string): unknown {
  return parse(text, { intAsBigInt: true });
}

/** Stable YAML rendering: no anchors/aliases, so repeated objects are written in full. */
export function stringifyYaml(value: unknown): string {
  return stringify(value, { aliasDuplicateObjects: false });
}

/** One line per zod issue, `path: message`. */
export function describeIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("\n");
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
