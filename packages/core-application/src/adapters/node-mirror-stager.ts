import fs from "node:fs/promises";
import type { Dirent, Stats } from "node:fs";
import path from "node:path";

import type { MirrorOptions, MirrorStager } from "../ports/mirror-stager";
import { createExcludeMatcher, type ExcludeMatcher } from "./exclude-patterns";

async function lstatOrNull(p: string): Promise<Stats | null> {
  try {
    return await fs.lstat(p);
  } catch {
    return null;
  }
}

function joinRel(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

async function copyAttributes(src: Stats, destAbs: string): Promise<void> {
  await fs.chmod(destAbs, src.mode & 0o7777);
  await fs.utimes(destAbs, src.atime, src.mtime);
}

/**
 * Pure-Node mirror with the same exclude and delete semantics as `rsync -a`.
 * Files are only rewritten when size or mtime differ (rsync's quick check).
 */
export class NodeMirrorStager implements MirrorStager {
  async mirror(source: string, destination: string, options: MirrorOptions): Promise<void> {
    const stat = await fs.stat(source);
    if (!stat.isDirectory()) {
      throw new Error(`mirror source is not a directory: ${source}`);
    }

    await fs.mkdir(destination, { recursive: true });
    const isExcluded = createExcludeMatcher(options.exclude);

    await this.syncDir(source, destination, "", isExcluded, options.deleteExtraneous);
    await copyAttributes(stat, destination);
  }

  private async syncDir(
    srcRoot: string,
    destRoot: string,
    rel: string,
    isExcluded: ExcludeMatcher,
    deleteExtraneous: boolean
  ): Promise<void> {
    const srcDir = path.join(srcRoot, rel);
    const destDir = path.join(destRoot, rel);

    const entries = await fs.readdir(srcDir, { withFileTypes: true });
    const kept = new Set<string>();

    for (const entry of entries) {
      const childRel = joinRel(rel, entry.name);
      if (isExcluded(childRel, entry.isDirectory())) continue;
      kept.add(entry.name);

      const srcAbs = path.join(srcDir, entry.name);
      const destAbs = path.join(destDir, entry.name);
      const srcStat = await fs.lstat(srcAbs);
      const destStat = await lstatOrNull(destAbs);

      if (entry.isDirectory()) {
        if (destStat && !destStat.isDirectory()) await fs.rm(destAbs, { force: true });
        await fs.mkdir(destAbs, { recursive: true });
        await this.syncDir(srcRoot, destRoot, childRel, isExcluded, deleteExtraneous);
        await copyAttributes(srcStat, destAbs);
      } else if (entry.isSymbolicLink()) {
        if (destStat) await fs.rm(destAbs, { recursive: true, force: true });
        await fs.symlink(await fs.readlink(srcAbs), destAbs);
      } else if (entry.isFile()) {
        // a symlink in the way is replaced, never written through
        if (destStat?.isDirectory() || destStat?.isSymbolicLink()) {
          await fs.rm(destAbs, { recursive: true, force: true });
        }

        const unchanged =
          destStat?.isFile() &&
          destStat.size === srcStat.size &&
          Math.trunc(destStat.mtimeMs) === Math.trunc(srcStat.mtimeMs);
        if (unchanged) continue;

        await fs.copyFile(srcAbs, destAbs);
        await copyAttributes(srcStat, destAbs);
      }
      // sockets, fifos and devices are skipped
    }

    if (deleteExtraneous) {
      await this.deleteExtraneous(destDir, rel, kept, isExcluded);
    }
  }

  private async deleteExtraneous(
    destDir: string,
    rel: string,
    kept: Set<string>,
    isExcluded: ExcludeMatcher
  ): Promise<void> {
    let destEntries: Dirent[];
    try {
      destEntries = await fs.readdir(destDir, { withFileTypes: true });
    } catch {
      return;
    }

    for (const entry of destEntries) {
      if (kept.has(entry.name)) continue;
      // excluded entries on the receiving side are protected
      if (isExcluded(joinRel(rel, entry.name), entry.isDirectory())) continue;
      await fs.rm(path.join(destDir, entry.name), { recursive: true, force: true });
    }
  }
}
