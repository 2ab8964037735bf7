import {mkdtemp, readFile, readdir, rm, writeFile} from "node:fs/promises";
import {tmpdir} from "node:os";
import {join} from "node:path";
import {afterEach, beforeEach, describe, expect, it, vi} from "vitest";
import {ensureLocalCsv, resolveRemoteUrl, type FetchFn} from "../src/kbSource.mjs";

describe("resolveRemoteUrl", () => {
  it("maps gs:// objects to the public storage endpoint", () => {
    expect(resolveRemoteUrl("gs://demo-bucket/kb/cases.csv"))
      .toBe("https://storage.googleapis.com/demo-bucket/kb/cases.csv");
  });

  it("passes http(s) URLs through", () => {
    expect(resolveRemoteUrl("https://example.org/cases.csv")).toBe("https://example.org/cases.csv");
  });

  it("rejects bucket-only and unknown schemes", () => {
    expect(resolveRemoteUrl("gs://demo-bucket")).toBeUndefined();
    expect(resolveRemoteUrl("gs://demo-bucket/")).toBeUndefined();
    expect(resolveRemoteUrl("s3://demo-bucket/cases.csv")).toBeUndefined();
  });
});

describe("ensureLocalCsv", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "kb-source-"));
  });

  afterEach(async () => {
    await rm(dir, {recursive: true, force: true});
  });

  it("uses an existing local file without fetching", async () => {
    const localPath = join(dir, "cases.csv");
    await writeFile(localPath, "condition\nFlu\n");
    const fetchImpl = vi.fn<FetchFn>(async () => new Response("unused"));

    const res = await ensureLocalCsv(
      {localPath, remoteUri: "gs://demo-bucket/cases.csv", timeoutMs: 1000}, fetchImpl);

    expect(res).toEqual({ok: true, value: localPath});
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("reports a missing file when no remote is configured", async () => {
    const res = await ensureLocalCsv({localPath: join(dir, "missing.csv"), timeoutMs: 1000});
    expect(res).toEqual({ok: false, error: {kind: "no-remote"}});
  });

  it("reports unsupported remote URIs", async () => {
    const fetchImpl = vi.fn<FetchFn>(async () => new Response("unused"));
    const res = await ensureLocalCsv(
      {localPath: join(dir, "missing.csv"), remoteUri: "ftp://host/cases.csv", timeoutMs: 1000},
      fetchImpl);
    expect(res).toEqual({ok: false, error: {kind: "unsupported-uri", uri: "ftp://host/cases.csv"}});
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("downloads once into the local path, creating directories", async () => {
    const localPath = join(dir, "nested", "kb", "cases.csv");
    const fetchImpl = vi.fn<FetchFn>(async () => new Response("condition,symptoms\nFlu,fever\n"));

    const res = await ensureLocalCsv(
      {localPath, remoteUri: "gs://demo-bucket/kb/cases.csv", timeoutMs: 1000}, fetchImpl);

    expect(res).toEqual({ok: true, value: localPath});
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl).toHaveBeenCalledWith(
      "https://storage.googleapis.com/demo-bucket/kb/cases.csv",
      expect.objectContaining({signal: expect.anything()}));
    expect(await readFile(localPath, "utf8")).toBe("condition,symptoms\nFlu,fever\n");
    expect(await readdir(join(dir, "nested", "kb"))).toEqual(["cases.csv"]);
  });

  it("reports write-failed and leaves no partial file when the target directory is unusable", async () => {
    await writeFile(join(dir, "blocker"), "not a directory");
    const localPath = join(dir, "blocker", "cases.csv");
    const fetchImpl = vi.fn<FetchFn>(async () => new Response("condition\nFlu\n"));

    const res = await ensureLocalCsv(
      {localPath, remoteUri: "https://example.org/cases.csv", timeoutMs: 1000}, fetchImpl);

    expect(res.ok ? undefined : res.error.kind).toBe("write-failed");
    expect((await readdir(dir)).sort()).toEqual(["blocker"]);
  });

  it("turns a non-2xx response into an http-status error", async () => {
    const fetchImpl = vi.fn<FetchFn>(async () => new Response("nope", {status: 404}));
    const res = await ensureLocalCsv(
      {localPath: join(dir, "cases.csv"), remoteUri: "https://example.org/cases.csv", timeoutMs: 1000},
      fetchImpl);
    expect(res).toEqual({
      ok: false,
      error: {kind: "http-status", url: "https://example.org/cases.csv", status: 404},
    });
  });

  it("turns a thrown fetch into a network error", async () => {
    const fetchImpl = vi.fn<FetchFn>(async () => {
      throw new Error("connect ECONNREFUSED");
    });
    const res = await ensureLocalCsv(
      {localPath: join(dir, "cases.csv"), remoteUri: "https://example.org/cases.csv", timeoutMs: 1000},
      fetchImpl);
    expect(res).toEqual({
      ok: false,
      error: {kind: "network", url: "https://example.org/cases.csv", message: "connect ECONNREFUSED"},
    });
  });
});
