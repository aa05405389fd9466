import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { NodeMirrorStager } from "./node-mirror-stager";

async function write(root: string, rel: string, content: string): Promise<void> {
  const abs = path.join(root, rel);
  await fs.mkdir(path.dirname(abs), { recursive: true });
  await fs.writeFile(abs, content, "utf-8");
}

async function listFiles(root: string, rel = ""): Promise<string[]> {
  const out: string[] = [];
  for (const e of await fs.readdir(path.join(root, rel), { withFileTypes: true })) {
    const child = rel ? `${rel}/${e.name}` : e.name;
    if (e.isDirectory()) out.push(...(await listFiles(root, child)));
    else out.push(child);
  }
  return out.sort();
}

describe("NodeMirrorStager", () => {
  let tmp: string;
  let src: string;
  let dest: string;
  const stager = new NodeMirrorStager();

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "sitevault-mirror-"));
    src = path.join(tmp, "src");
    dest = path.join(tmp, "dest");
    await fs.mkdir(src, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it("copies the tree without excluded entries and keeps mode and mtime", async () => {
    await write(src, "index.php", "<?php echo 1;");
    await write(src, "sub/a.txt", "alpha");
    await write(src, "wp/cache/page.html", "cached");
    await write(src, "debug.log", "noise");

    const stamp = new Date("2024-03-01T10:00:00Z");
    await fs.chmod(path.join(src, "sub/a.txt"), 0o640);
    await fs.utimes(path.join(src, "sub/a.txt"), stamp, stamp);

    await stager.mirror(src, dest, { exclude: ["*.log", "cache/"], deleteExtraneous: false });

    expect(await listFiles(dest)).toEqual(["index.php", "sub/a.txt"]);
    expect(await fs.readFile(path.join(dest, "sub/a.txt"), "utf-8")).toBe("alpha");

    const copied = await fs.stat(path.join(dest, "sub/a.txt"));
    expect(copied.mode & 0o777).toBe(0o640);
    expect(copied.mtime.getTime()).toBe(stamp.getTime());
  });

  it("leaves destination-only files alone without deleteExtraneous", async () => {
    await write(src, "keep.txt", "new");
    await write(dest, "removed-upstream.txt", "old");

    await stager.mirror(src, dest, { exclude: [], deleteExtraneous: false });

    expect(await listFiles(dest)).toEqual(["keep.txt", "removed-upstream.txt"]);
  });

  it("replaces a destination symlink instead of writing through it", async () => {
    await write(src, "index.php", "snapshot content");
    await write(tmp, "outside.txt", "precious");
    await fs.mkdir(dest, { recursive: true });
    await fs.symlink("../outside.txt", path.join(dest, "index.php"));

    await stager.mirror(src, dest, { exclude: [], deleteExtraneous: true });

    expect(await fs.readFile(path.join(tmp, "outside.txt"), "utf-8")).toBe("precious");
    const replaced = await fs.lstat(path.join(dest, "index.php"));
    expect(replaced.isSymbolicLink()).toBe(false);
    expect(await fs.readFile(path.join(dest, "index.php"), "utf-8")).toBe("snapshot content");
  });

  it("deletes extraneous entries but protects excluded ones", async () => {
    await write(src, "index.php", "v1");
    await write(dest, "stale/old.txt", "old");
    await write(dest, "shop_backup.sql", "-- dump");
    await write(dest, ".git/HEAD", "ref: refs/heads/main");

    await stager.mirror(src, dest, { exclude: [".git/", "*_backup.sql"], deleteExtraneous: true });

    expect(await listFiles(dest)).toEqual([".git/HEAD", "index.php", "shop_backup.sql"]);
  });

  it("rewrites files whose content changed", async () => {
    await write(src, "config.php", "define('X', 2);");
    await write(dest, "config.php", "define('X', 1); // old");

    await stager.mirror(src, dest, { exclude: [], deleteExtraneous: false });

    expect(await fs.readFile(path.join(dest, "config.php"), "utf-8")).toBe("define('X', 2);");
  });

  it("rejects when the source does not exist", async () => {
    await expect(
      stager.mirror(path.join(tmp, "missing"), dest, { exclude: [], deleteExtraneous: false })
    ).rejects.toThrow();
  });
});
