import * as fs from "node:fs/promises";
import { ResourceNotFoundError } from "../../http/errors.js";
import type { IFileSystem } from "../../interfaces/filesystem.js";

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

export class NodeFileSystem implements IFileSystem {
  async readFile(filePath: string): Promise<Uint8Array> {
    try {
      return new Uint8Array(await fs.readFile(filePath));
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        throw new ResourceNotFoundError(filePath);
      }
      throw err;
    }
  }

  async writeFile(filePath: string, data: Uint8Array): Promise<void> {
    await fs.writeFile(filePath, data);
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }
}
