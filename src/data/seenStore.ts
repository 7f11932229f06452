import fs from "fs";
import { logger } from "../utils/logger";
import { fail, ok, toError, type Result } from "../utils/result";

/** Reads the append-only record; one id per non-blank line. A missing file is an empty set. */
export function loadSeenIds(filePath: string): Result<Set<string>> {
  try {
    if (!fs.existsSync(filePath)) return ok(new Set<string>());
    const raw = fs.readFileSync(filePath, "utf-8");
    const ids = new Set<string>();
    for (const line of raw.split(/\r?\n/)) {
      const id = line.trim();
      if (id) ids.add(id);
    }
    return ok(ids);
  } catch (err) {
    return fail(toError(err));
  }
}

/** Opens, appends and closes on every call, so an interrupted run loses at most the id in flight. */
export function appendSeenId(filePath: string, id: string): Result<void> {
  try {
    fs.appendFileSync(filePath, `${id}\n`, "utf-8");
    return ok(undefined);
  } catch (err) {
    return fail(toError(err));
  }
}

/**
 * In-memory view of already forwarded tweet ids, backed by a flat file.
 *
 * Both reads and writes fail open: a failed load starts from an empty set and a failed
 * append still marks the id in memory, so a run never sends the same tweet twice but a
 * later run may.
 */
export class SeenStore {
  private ids = new Set<string>();

  constructor(private readonly filePath: string) {}

  load(): Result<Set<string>> {
    const loaded = loadSeenIds(this.filePath);
    if (loaded.ok) {
      this.ids = loaded.value;
      logger.debug({ file: this.filePath, count: this.ids.size }, "Loaded seen tweet ids");
    } else {
      this.ids = new Set<string>();
      logger.error({ file: this.filePath, error: loaded.error.message }, "Failed to load seen tweet ids");
    }
    return loaded;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  record(id: string): Result<void> {
    this.ids.add(id);
    const written = appendSeenId(this.filePath, id);
    if (!written.ok) {
      logger.error({ file: this.filePath, id, error: written.error.message }, "Failed to save seen tweet id");
    }
    return written;
  }

  get size(): number {
    return this.ids.size;
  }
}
