import { type Stats, constants } from "node:fs";
import {
  copyFile,
  mkdir,
  readdir,
  rename,
  rmdir,
  stat,
  unlink,
} from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { errorMessage } from "@/services/MetadataTool";
import { errorCode } from "@/utils/helper";

import type { FileMoveError, FileMover } from "./FileMover";

export class FileMoverDefault implements FileMover {
  async move(from: string, to: string): Promise<Result<void, FileMoveError>> {
    if (from === to) return ok();
    try {
      if (await isOtherFile(from, to)) {
        return ioError(`目標已存在，不覆蓋: ${to}`);
      }
      await mkdir(path.dirname(to), { recursive: true });
      await rename(from, to);
      return ok();
    } catch (error) {
      if (errorCode(error) !== "EXDEV") {
        return ioError(`搬移失敗 ${from} → ${to}: ${errorMessage(error)}`);
      }
    }
    // 跨裝置時改為複製後刪除
    try {
      await copyFile(from, to, constants.COPYFILE_EXCL);
      await unlink(from);
      return ok();
    } catch (error) {
      return ioError(`跨裝置搬移失敗 ${from} → ${to}: ${errorMessage(error)}`);
    }
  }

  async listExisting(
    dirs: Iterable<string>
  ): Promise<Result<string[], FileMoveError>> {
    const files: string[] = [];
    for (const dir of new Set(dirs)) {
      try {
        const entries = await readdir(dir, { withFileTypes: true });
        for (const entry of entries) {
          if (entry.isFile()) files.push(path.join(dir, entry.name));
        }
      } catch (error) {
        if (errorCode(error) === "ENOENT") continue;
        return ioError(`讀取目錄失敗: ${dir}: ${errorMessage(error)}`);
      }
    }
    return ok(files.sort());
  }

  async removeEmptyDirs(
    root: string,
    dirs: Iterable<string>
  ): Promise<Result<string[], FileMoveError>> {
    const base = path.resolve(root);
    const removed: string[] = [];
    const starts = [...new Set([...dirs].map((d) => path.resolve(d)))].sort().reverse();
    try {
      for (const start of starts) {
        let dir = start;
        while (isBelow(base, dir) && (await isEmptyDir(dir))) {
          await rmdir(dir);
          removed.push(dir);
          dir = path.dirname(dir);
        }
      }
      return ok(removed);
    } catch (error) {
      return ioError(`清除空目錄失敗: ${root}: ${errorMessage(error)}`);
    }
  }
}

/**
 * 目標存在且不是來源本身。只差大小寫時，
 * 不分大小寫的檔案系統上兩個路徑指向同一檔案
 */
async function isOtherFile(from: string, to: string) {
  let target: Stats;
  try {
    target = await stat(to);
  } catch (error) {
    if (errorCode(error) === "ENOENT") return false;
    throw error;
  }
  if (from.toLowerCase() !== to.toLowerCase()) return true;
  const source = await stat(from);
  return source.dev !== target.dev || source.ino !== target.ino;
}

function isBelow(root: string, dir: string) {
  const relative = path.relative(root, dir);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

async function isEmptyDir(dir: string) {
  try {
    return (await readdir(dir)).length === 0;
  } catch (error) {
    if (errorCode(error) === "ENOENT") return false;
    throw error;
  }
}

function ioError(message: string): Result<never, FileMoveError> {
  return err({ type: "IO_ERROR", message });
}
