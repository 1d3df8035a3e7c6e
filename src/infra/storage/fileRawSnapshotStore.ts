import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { err, ok, type Result } from "neverthrow";
import type {
  RawSnapshotStorePort,
  SnapshotStoreError,
  SnapshotWriteRequest,
} from "../../core/ports/outboundPorts";

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Keeps one verbatim provider response per symbol and calendar day under `{SYMBOL}_{YYYY-MM-DD}.json`.
 */
export class FileRawSnapshotStore implements RawSnapshotStorePort {
  constructor(private readonly directory: string) {}

  snapshotPath(symbol: string, fetchedOn: string): string {
    return join(this.directory, `${symbol}_${fetchedOn}.json`);
  }

  /**
   * Writes through a temp file and rename so a crash never leaves a half-written snapshot under the final name.
   * Re-running on the same day replaces that day's file only.
   */
  async write(
    request: SnapshotWriteRequest,
  ): Promise<Result<string, SnapshotStoreError>> {
    const path = this.snapshotPath(request.symbol, request.fetchedOn);
    const tempPath = `${path}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempPath, JSON.stringify(request.payload, null, 4), "utf8");
      await rename(tempPath, path);
      return ok(path);
    } catch (error) {
      return err({
        code: "write_failed",
        path,
        message:
          error instanceof Error
            ? `Could not write snapshot: ${error.message}`
            : "Could not write snapshot.",
        cause: error,
      });
    }
  }

  async read(path: string): Promise<Result<unknown, SnapshotStoreError>> {
    let contents: string;
    try {
      contents = await readFile(path, "utf8");
    } catch (error) {
      return err({
        code: isMissingFileError(error) ? "not_found" : "read_failed",
        path,
        message: isMissingFileError(error)
          ? "Snapshot file does not exist."
          : "Snapshot file could not be read.",
        cause: error,
      });
    }

    try {
      const payload: unknown = JSON.parse(contents);
      return ok(payload);
    } catch (error) {
      return err({
        code: "invalid_json",
        path,
        message: "Snapshot file is not valid JSON.",
        cause: error,
      });
    }
  }
}
