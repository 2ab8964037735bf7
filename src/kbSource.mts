import {access, mkdir, rename, rm, writeFile} from "node:fs/promises";
import {dirname} from "node:path";
import type {KnowledgeBaseSource} from "./types.mjs";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type FetchError =
  | { kind: "no-remote" }
  | { kind: "unsupported-uri"; uri: string }
  | { kind: "http-status"; url: string; status: number }
  | { kind: "network"; url: string; message: string }
  | { kind: "write-failed"; path: string; message: string };

export type FetchFn = typeof fetch;

const GCS_PUBLIC_HOST = "https://storage.googleapis.com";

/** gs://bucket/obj -> public HTTPS object URL; http(s) passes through. */
export function resolveRemoteUrl(uri: string): string | undefined {
  if (uri.startsWith("gs://")) {
    const [bucket, ...objectPath] = uri.slice("gs://".length).split("/");
    if (!bucket || objectPath.length === 0 || objectPath.every(p => p === "")) {
      return undefined;
    }
    return `${GCS_PUBLIC_HOST}/${[bucket, ...objectPath].map(encodeURIComponent).join("/")}`;
  }
  if (/^https?:\/\//i.test(uri)) {
    return uri;
  }
  return undefined;
}

export function describeFetchError(e: FetchError): string {
  switch (e.kind) {
    case "no-remote":
      return "local file missing and no remote URI configured";
    case "unsupported-uri":
      return `unsupported remote URI ${e.uri}`;
    case "http-status":
      return `GET ${e.url} returned ${e.status}`;
    case "network":
      return `GET ${e.url} failed: ${e.message}`;
    case "write-failed":
      return `could not write ${e.path}: ${e.message}`;
  }
}

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Make sure the knowledge base CSV is on local disk.
 *
 * An existing local file is used as-is. Otherwise the remote object is
 * downloaded once (no retry) and written to `localPath`.
 */
export async function ensureLocalCsv(
  source: Pick<KnowledgeBaseSource, "localPath" | "remoteUri" | "timeoutMs">,
  fetchImpl: FetchFn = fetch
): Promise<Result<string, FetchError>> {
  const {localPath, remoteUri, timeoutMs} = source;
  if (await exists(localPath)) {
    return {ok: true, value: localPath};
  }
  if (!remoteUri) {
    return {ok: false, error: {kind: "no-remote"}};
  }

  const url = resolveRemoteUrl(remoteUri);
  if (!url) {
    return {ok: false, error: {kind: "unsupported-uri", uri: remoteUri}};
  }

  let body: Uint8Array;
  try {
    const res = await fetchImpl(url, {signal: AbortSignal.timeout(timeoutMs)});
    if (!res.ok) {
      return {ok: false, error: {kind: "http-status", url, status: res.status}};
    }
    body = new Uint8Array(await res.arrayBuffer());
  } catch (err) {
    return {ok: false, error: {kind: "network", url, message: messageOf(err)}};
  }

  // written beside the target and renamed, so a partial download never
  // shows up as an existing local file
  const partPath = `${localPath}.tmp`;
  try {
    await mkdir(dirname(localPath), {recursive: true});
    await writeFile(partPath, body);
    await rename(partPath, localPath);
  } catch (err) {
    await rm(partPath, {force: true}).catch((rmErr: unknown) =>
      console.error(`[kb-source] could not remove ${partPath}:`, messageOf(rmErr)));
    return {ok: false, error: {kind: "write-failed", path: localPath, message: messageOf(err)}};
  }

  console.error(`[kb-source] downloaded ${url} -> ${localPath} (${body.byteLength} bytes)`);
  return {ok: true, value: localPath};
}
