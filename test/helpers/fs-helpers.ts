import { mkdtemp, rm, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export async function createTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}-`));
}

export async function cleanupTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

export interface FileTree {
  [name: string]: string | FileTree;
}

export async function createFileStructure(root: string, structure: FileTree): Promise<void> {
  await mkdir(root, { recursive: true });

  for (const [name, content] of Object.entries(structure)) {
    const path = join(root, name);

    if (typeof content === "string") {
      await writeFile(path, content);
    } else {
      await createFileStructure(path, content);
    }
  }
}
