import type { HistoryEntry } from "../types.js";
import { StorageError } from "./errors.js";
import { ensureFile, readTextFile, writeJsonFile } from "./fileStore.js";

const MICROS_PER_SECOND = 1_000_000;

const historyDateFormat = new Intl.DateTimeFormat("en-US", {
  month: "short",
  day: "2-digit",
  year: "numeric",
  hour: "2-digit",
  minute: "2-digit",
  second: "2-digit",
  hour12: true
});

/** `Oct 18, 2026 at 03:04:05 PM`, in local time. */
export const formatHistoryDate = (date: Date): string => {
  const parts = new Map(historyDateFormat.formatToParts(date).map((part) => [part.type, part.value]));
  const part = (type: Intl.DateTimeFormatPartTypes): string => parts.get(type) ?? "";
  return `${part("month")} ${part("day")}, ${part("year")} at ${part("hour")}:${part("minute")}:${part("second")} ${part("dayPeriod")}`;
};

const keyToMicros = (key: string): number => {
  const [whole = "", fraction = ""] = key.split(".");
  const micros = Number(whole) * MICROS_PER_SECOND + Number(fraction.padEnd(6, "0").slice(0, 6));
  return Number.isFinite(micros) ? micros : 0;
};

const microsToKey = (micros: number): string =>
  `${Math.floor(micros / MICROS_PER_SECOND)}.${String(micros % MICROS_PER_SECOND).padStart(6, "0")}`;

const isHistoryEntry = (value: unknown): value is HistoryEntry => {
  if (!value || typeof value !== "object") return false;
  return (
    "user" in value &&
    typeof value.user === "string" &&
    "formatted-date" in value &&
    typeof value["formatted-date"] === "string" &&
    "version" in value &&
    typeof value.version === "string"
  );
};

/**
 * Append-only edit log of one page, kept as a single JSON object keyed by
 * epoch seconds with microsecond fractions. Every append rewrites the file.
 */
export class HistoryStore {
  private constructor(
    readonly path: string,
    readonly url: string,
    private readonly entries: Map<string, HistoryEntry>
  ) {}

  /** Loads the history file, creating it as `{}` when it does not exist yet. */
  static async open(path: string, url: string): Promise<HistoryStore> {
    await ensureFile(path, "{}\n");
    const raw = await readTextFile(path);
    if (raw === null) {
      throw new StorageError(`History file disappeared: ${path}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new StorageError(`Corrupt history file: ${path}`, { cause: error });
    }

    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new StorageError(`History file is not a JSON object: ${path}`);
    }

    const entries = new Map<string, HistoryEntry>();
    for (const [key, value] of Object.entries(parsed)) {
      if (!isHistoryEntry(value)) {
        throw new StorageError(`Invalid history entry ${key} in ${path}`);
      }
      entries.set(key, value);
    }

    return new HistoryStore(path, url, entries);
  }

  /**
   * An empty history that touches nothing on disk until the first `append`,
   * which replaces whatever file is already at `path`.
   */
  static detached(path: string, url: string): HistoryStore {
    return new HistoryStore(path, url, new Map());
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): HistoryEntry | undefined {
    return this.entries.get(key);
  }

  /** Timestamp keys, newest first. */
  entryKeys(): string[] {
    return [...this.entries.keys()].sort((a, b) => keyToMicros(b) - keyToMicros(a));
  }

  latest(): HistoryEntry | undefined {
    const [newest] = this.entryKeys();
    return newest === undefined ? undefined : this.entries.get(newest);
  }

  /**
   * Records a snapshot and rewrites the file. Keys are strictly increasing:
   * two appends within the same microsecond get consecutive keys.
   */
  async append(user: string, version: string, now: Date = new Date()): Promise<string> {
    const newest = this.entryKeys()[0];
    const micros = Math.max(now.getTime() * 1000, newest === undefined ? 0 : keyToMicros(newest) + 1);
    const key = microsToKey(micros);

    this.entries.set(key, {
      user,
      "formatted-date": formatHistoryDate(now),
      version
    });

    try {
      await writeJsonFile(this.path, Object.fromEntries(this.entries));
    } catch (error) {
      this.entries.delete(key);
      throw error;
    }
    return key;
  }
}
