/**
 * Local video storage. Artifacts are streamed to STORAGE_PATH and served
 * under /videos.
 */

import { once } from "events";
import { createWriteStream } from "fs";
import { mkdir, rename, rm, stat } from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { randomUUID } from "crypto";
import { ARTIFACT_TIMEOUT_MS } from "../providers/http.js";

export const VIDEOS_ROUTE = "/videos";

export interface ArtifactDownloader {
  /**
   * Returns the storage-relative path, e.g. /videos/gen_abc.mp4.
   * Aborting `signal` stops the transfer and leaves no file behind.
   */
  download(url: string, filename?: string, headers?: Record<string, string>, signal?: AbortSignal): Promise<string>;
}

/** Downloader plus the housekeeping the API needs. */
export interface ArtifactStore extends ArtifactDownloader {
  delete(videoPath: string): Promise<boolean>;
  exists(filename: string): Promise<boolean>;
}

export class ArtifactDownloadError extends Error {
  override readonly name = "ArtifactDownloadError";
}

const SAFE_FILENAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export class FileArtifactStorage implements ArtifactStore {
  constructor(
    readonly storageDir: string,
    private readonly timeoutMs: number = ARTIFACT_TIMEOUT_MS
  ) {}

  resolvePath(filename: string): string {
    if (!SAFE_FILENAME.test(filename)) {
      throw new ArtifactDownloadError(`Invalid artifact filename: ${filename}`);
    }
    return path.join(this.storageDir, filename);
  }

  async download(
    url: string,
    filename: string = `${randomUUID()}.mp4`,
    headers: Record<string, string> = {},
    signal?: AbortSignal
  ): Promise<string> {
    const target = this.resolvePath(filename);
    signal?.throwIfAborted();
    await mkdir(this.storageDir, { recursive: true });

    const res = await fetch(url, { headers, signal: AbortSignal.timeout(this.timeoutMs) });
    if (!res.ok) {
      throw new ArtifactDownloadError(`Artifact download failed: HTTP ${res.status}`);
    }
    if (!res.body) {
      throw new ArtifactDownloadError("Artifact download failed: empty body");
    }

    signal?.throwIfAborted();

    const partial = `${target}.part`;
    const sink = createWriteStream(partial);
    try {
      await pipeline(Readable.fromWeb(res.body), sink, { signal });
      signal?.throwIfAborted();
      await rename(partial, target);
    } catch (e) {
      // an aborted sink can still be opening the file
      if (!sink.closed) await once(sink, "close");
      await rm(partial, { force: true });
      throw e;
    }
    return `${VIDEOS_ROUTE}/${filename}`;
  }

  async exists(filename: string): Promise<boolean> {
    try {
      const s = await stat(this.resolvePath(filename));
      return s.isFile();
    } catch {
      return false;
    }
  }

  /** Removes a stored artifact given its filename or /videos/ path. */
  async delete(videoPath: string): Promise<boolean> {
    const filename = path.posix.basename(videoPath);
    if (!(await this.exists(filename))) return false;
    await rm(this.resolvePath(filename));
    return true;
  }
}
