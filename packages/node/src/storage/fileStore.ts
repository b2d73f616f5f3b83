/**
 * packages/node/src/storage/fileStore.ts — App-scoped file and JSON storage.
 *
 * Files live under one app directory (default `~/.<appname>`), optionally in
 * a single-level subdirectory. Every operation resolves to a StoreResult;
 * I/O failures are logged and reported, never thrown.
 */

import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { type Logger, noopLogger } from "@droidlet/core";

export type StoreResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: string }>;

export type FileStoreOptions = Readonly<{
  appName: string;
  /** Overrides the app directory. Default: `~/.<appName lowercased>`. */
  baseDir?: string;
  logger?: Logger;
}>;

export interface FileStore {
  readonly appDir: string;
  writeFile(filename: string, content: string, subdir?: string): Promise<StoreResult<string>>;
  readFile(filename: string, subdir?: string): Promise<StoreResult<string>>;
  deleteFile(filename: string, subdir?: string): Promise<StoreResult<string>>;
  /** Regular files only, sorted. A missing directory lists as empty. */
  listFiles(subdir?: string): Promise<StoreResult<readonly string[]>>;
  saveJson(filename: string, data: unknown, subdir?: string): Promise<StoreResult<string>>;
  loadJson(filename: string, subdir?: string): Promise<StoreResult<unknown>>;
}

function isNodeErrorWithCode(error: unknown): error is Readonly<{ code: string }> {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  );
}

function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Reject names that would escape the app directory. */
function sanitizeSegment(kind: "filename" | "subdir", name: string): string | null {
  const trimmed = name.trim();
  if (trimmed.length === 0) return kind === "subdir" ? "" : null;
  if (trimmed.includes("/") || trimmed.includes("\\") || trimmed === "." || trimmed === "..") {
    return null;
  }
  return trimmed;
}

function fail<T>(error: string): StoreResult<T> {
  return Object.freeze({ ok: false, error });
}

function ok<T>(value: T): StoreResult<T> {
  return Object.freeze({ ok: true, value });
}

export function createFileStore(opts: FileStoreOptions): FileStore {
  const appDir = opts.baseDir ?? path.join(homedir(), `.${opts.appName.toLowerCase()}`);
  const logger = (opts.logger ?? noopLogger).child(`FileStore.${opts.appName}`);

  const resolveDir = (subdir: string): string | null => {
    const seg = sanitizeSegment("subdir", subdir);
    if (seg === null) return null;
    return seg.length === 0 ? appDir : path.join(appDir, seg);
  };

  const resolveFile = (filename: string, subdir: string): string | null => {
    const dir = resolveDir(subdir);
    const name = sanitizeSegment("filename", filename);
    if (dir === null || name === null) return null;
    return path.join(dir, name);
  };

  const invalidName = <T>(op: string, filename: string, subdir: string): StoreResult<T> => {
    const error = `${op}: invalid file name "${filename}"${subdir ? ` in "${subdir}"` : ""}`;
    logger.error(error);
    return fail(error);
  };

  const store: FileStore = {
    appDir,

    async writeFile(filename, content, subdir = "") {
      const filepath = resolveFile(filename, subdir);
      if (filepath === null) return invalidName("writeFile", filename, subdir);
      try {
        await mkdir(path.dirname(filepath), { recursive: true });
        await writeFile(filepath, content, "utf8");
        logger.info(`File written successfully: ${filepath}`);
        return ok(filepath);
      } catch (err) {
        const error = `Failed to write file ${filename}: ${describeError(err)}`;
        logger.error(error);
        return fail(error);
      }
    },

    async readFile(filename, subdir = "") {
      const filepath = resolveFile(filename, subdir);
      if (filepath === null) return invalidName("readFile", filename, subdir);
      try {
        const content = await readFile(filepath, "utf8");
        logger.info(`File read successfully: ${filepath}`);
        return ok(content);
      } catch (err) {
        const error = `Failed to read file ${filename}: ${describeError(err)}`;
        logger.error(error);
        return fail(error);
      }
    },

    async deleteFile(filename, subdir = "") {
      const filepath = resolveFile(filename, subdir);
      if (filepath === null) return invalidName("deleteFile", filename, subdir);
      try {
        await rm(filepath);
        logger.info(`File deleted successfully: ${filepath}`);
        return ok(filepath);
      } catch (err) {
        const error = `Failed to delete file ${filename}: ${describeError(err)}`;
        logger.error(error);
        return fail(error);
      }
    },

    async listFiles(subdir = "") {
      const dir = resolveDir(subdir);
      if (dir === null) return invalidName("listFiles", "", subdir);
      try {
        const entries = await readdir(dir, { withFileTypes: true });
        const files = entries
          .filter((entry) => entry.isFile())
          .map((entry) => entry.name)
          .sort();
        return ok(Object.freeze(files));
      } catch (err) {
        if (isNodeErrorWithCode(err) && err.code === "ENOENT") return ok(Object.freeze([]));
        const error = `Failed to list files: ${describeError(err)}`;
        logger.error(error);
        return fail(error);
      }
    },

    async saveJson(filename, data, subdir = "") {
      let json: string;
      try {
        json = JSON.stringify(data, null, 2);
      } catch (err) {
        const error = `Failed to save JSON ${filename}: ${describeError(err)}`;
        logger.error(error);
        return fail(error);
      }
      if (json === undefined) {
        const error = `Failed to save JSON ${filename}: value is not serializable`;
        logger.error(error);
        return fail(error);
      }
      return store.writeFile(filename, json, subdir);
    },

    async loadJson(filename, subdir = "") {
      const read = await store.readFile(filename, subdir);
      if (!read.ok) return read;
      try {
        return ok<unknown>(JSON.parse(read.value));
      } catch (err) {
        const error = `Failed to load JSON ${filename}: ${describeError(err)}`;
        logger.error(error);
        return fail(error);
      }
    },
  };

  return Object.freeze(store);
}
