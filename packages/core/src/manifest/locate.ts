import fs from "fs-extra";
import path from "path";

export const MANIFEST_FILENAME = "project.ptx";

const isFile = async (filePath: string): Promise<boolean> => {
  if (!(await fs.pathExists(filePath))) return false;
  return (await fs.stat(filePath)).isFile();
};

/**
 * Walks up from `startDir` and returns the first directory holding a manifest,
 * or `null` once the filesystem root has been checked.
 */
export const locateProjectRoot = async (
  startDir: string = process.cwd(),
  filename: string = MANIFEST_FILENAME,
): Promise<string | null> => {
  let current = path.resolve(startDir);
  for (;;) {
    if (await isFile(path.join(current, filename))) {
      return current;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
};
