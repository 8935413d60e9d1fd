/**
 * File Store
 * One pretty-printed JSON file per key under a base directory (DATA_DIR)
 */

import fs from "fs/promises";
import type { Dirent } from "fs";
import path from "path";
import { randomUUID } from "crypto";
import type { IStore } from "./types.js";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface FileStoreOptions {
  basePath: string;
  /** Indent documents; on by default */
  prettyPrint?: boolean;
}

export class FileStore implements IStore {
  private readonly basePath: string;
  private readonly indent: number | undefined;

  constructor(options: FileStoreOptions) {
    this.basePath = options.basePath;
    this.indent = options.prettyPrint === false ? undefined : 2;
  }

  private pathFor(key: string): string {
    return path.join(this.basePath, `${key}.json`);
  }

  async read(key: string): Promise<unknown> {
    try {
      const content = await fs.readFile(this.pathFor(key), "utf-8");
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Temp file then rename: a crash leaves the old document or the new one
   */
  async write(key: string, data: unknown): Promise<void> {
    const filePath = this.pathFor(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const content = JSON.stringify(data, null, this.indent);
    const tmpPath = `${filePath}.${randomUUID()}.tmp`;
    await fs.writeFile(tmpPath, content, "utf-8");
    await fs.rename(tmpPath, filePath);
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.pathFor(key));
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * List keys (relative paths without .json, "/"-separated) starting with prefix
   */
  async list(prefix?: string): Promise<string[]> {
    const keys: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isNotFound(error)) return;
        throw error;
      }

      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);

        if (entry.isDirectory()) {
          await walk(fullPath);
        } else if (entry.isFile() && entry.name.endsWith(".json")) {
          const key = path
            .relative(this.basePath, fullPath)
            .split(path.sep)
            .join("/")
            .replace(/\.json$/, "");

          if (!prefix || key.startsWith(prefix)) {
            keys.push(key);
          }
        }
      }
    };

    await walk(this.basePath);
    return keys.sort();
  }
}
