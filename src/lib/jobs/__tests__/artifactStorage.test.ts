import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { FileArtifactStorage } from "../artifactStorage.js";

describe("FileArtifactStorage", () => {
  let dir: string;
  let storage: FileArtifactStorage;
  const fetchMock = vi.fn();

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "video-gateway-"));
    storage = new FileArtifactStorage(path.join(dir, "videos"));
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it("streams the artifact to disk and returns its /videos path", async () => {
    fetchMock.mockResolvedValue(new Response("fake-mp4-bytes", { status: 200 }));

    const videoPath = await storage.download("https://provider.test/v.mp4", "gen_abc.mp4", {
      Authorization: "Bearer test-secret",
    });

    expect(videoPath).toBe("/videos/gen_abc.mp4");
    expect(await readFile(path.join(dir, "videos", "gen_abc.mp4"), "utf8")).toBe("fake-mp4-bytes");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://provider.test/v.mp4");
    expect(init.headers).toEqual({ Authorization: "Bearer test-secret" });
    expect(await storage.exists("gen_abc.mp4")).toBe(true);
  });

  it("generates a filename when none is given", async () => {
    fetchMock.mockResolvedValue(new Response("x", { status: 200 }));
    expect(await storage.download("https://provider.test/v.mp4")).toMatch(/^\/videos\/[0-9a-f-]{36}\.mp4$/);
  });

  it("throws on non-2xx and leaves nothing behind", async () => {
    fetchMock.mockResolvedValue(new Response("denied", { status: 403 }));
    await expect(storage.download("https://provider.test/v.mp4", "gen_abc.mp4")).rejects.toThrow(
      "Artifact download failed: HTTP 403"
    );
    expect(await readdir(path.join(dir, "videos"))).toEqual([]);
  });

  it("rejects filenames that could escape the storage directory", async () => {
    await expect(storage.download("https://provider.test/v.mp4", "../evil.mp4")).rejects.toThrow(
      "Invalid artifact filename: ../evil.mp4"
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("deletes by filename or /videos path", async () => {
    fetchMock.mockResolvedValue(new Response("x", { status: 200 }));
    await storage.download("https://provider.test/v.mp4", "gen_abc.mp4");
    expect(await storage.delete("/videos/gen_abc.mp4")).toBe(true);
    expect(await storage.exists("gen_abc.mp4")).toBe(false);
    expect(await storage.delete("gen_abc.mp4")).toBe(false);
  });

  it("does not fetch once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      storage.download("https://provider.test/v.mp4", "gen_abc.mp4", {}, controller.signal)
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("removes the partial file when aborted mid-transfer", async () => {
    const controller = new AbortController();
    const body = new ReadableStream<Uint8Array>({
      start(c) {
        c.enqueue(new TextEncoder().encode("first-chunk"));
      },
      pull() {
        controller.abort();
        return new Promise<void>(() => {});
      },
    });
    fetchMock.mockResolvedValue(new Response(body, { status: 200 }));

    await expect(
      storage.download("https://provider.test/v.mp4", "gen_abc.mp4", {}, controller.signal)
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(await readdir(path.join(dir, "videos"))).toEqual([]);
  });
});
