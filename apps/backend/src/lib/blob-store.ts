import fs from "fs";
import path from "path";
import { ApiError } from "../utils/errors.js";

export type BlobStore = {
  write(name: string, body: Buffer): Promise<string>;
  read(ref: string): Promise<Buffer | null>;
  remove(ref: string): Promise<boolean>;
};

const isMissingFile = (error: unknown) => error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Image files kept under a single root directory. A reference is the file
 * name relative to that root; anything resolving outside it is rejected.
 */
export class LocalBlobStore implements BlobStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
    fs.mkdirSync(this.root, { recursive: true });
  }

  resolve(ref: string) {
    const fullPath = path.resolve(this.root, ref);
    const relative = path.relative(this.root, fullPath);
    if (!relative || relative.split(path.sep)[0] === ".." || path.isAbsolute(relative)) {
      throw new ApiError(400, "Invalid image reference", { ref });
    }
    return fullPath;
  }

  async write(name: string, body: Buffer) {
    await fs.promises.writeFile(this.resolve(name), body, { flag: "wx" });
    return name;
  }

  async read(ref: string) {
    try {
      return await fs.promises.readFile(this.resolve(ref));
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async remove(ref: string) {
    try {
      await fs.promises.unlink(this.resolve(ref));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }
}
