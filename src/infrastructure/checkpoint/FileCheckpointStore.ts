import { mkdir, readFile, rename, writeFile } from "fs/promises";
import path from "path";
import type { Cursor } from "../../core/asset/asset.types";
import { isCursor } from "../../core/asset/cursor";
import { toErrorMessage } from "../../core/errors/ingestion.errors";
import type { CheckpointStore } from "../../ports/CheckpointStore";
import { silentLogger, type Logger } from "../../shared/logging/logger";

type CheckpointFile = Cursor & {
  namespace: string;
  updatedAt: string;
};

const isMissingFile = (err: unknown): boolean =>
  err instanceof Error && "code" in err && err.code === "ENOENT";

/**
 * Cursor checkpoint in a JSON file, replaced atomically (temp file + rename).
 * A file written for another namespace is ignored.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(
    private readonly filePath: string,
    private readonly namespace: string,
    private readonly logger: Logger = silentLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async load(): Promise<Cursor | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.logger.warn("checkpoint.corrupt", { path: this.filePath, reason: toErrorMessage(err) });
      return undefined;
    }

    if (!isCursor(parsed)) {
      this.logger.warn("checkpoint.corrupt", { path: this.filePath, reason: "missing cursor fields" });
      return undefined;
    }
    const namespace = "namespace" in parsed ? parsed.namespace : undefined;
    if (namespace !== this.namespace) {
      this.logger.warn("checkpoint.namespace_mismatch", {
        path: this.filePath,
        expected: this.namespace,
        found: typeof namespace === "string" ? namespace : null
      });
      return undefined;
    }

    return { lastSeenTimestamp: parsed.lastSeenTimestamp, lastSeenId: parsed.lastSeenId };
  }

  async save(cursor: Cursor): Promise<void> {
    const payload: CheckpointFile = {
      namespace: this.namespace,
      lastSeenTimestamp: cursor.lastSeenTimestamp,
      lastSeenId: cursor.lastSeenId,
      updatedAt: this.now().toISOString()
    };

    await mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tmpPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
    await rename(tmpPath, this.filePath);
  }
}
