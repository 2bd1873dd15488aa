/**
 * Convert PNG images to Glyphcaster text textures (digits 0-9, "." for
 * transparent texels).
 *
 * Usage:  tsx scripts/convert-assets.ts <srcDir> <dstDir> [--size 16x16] [--sprite] [--key-background]
 *
 * Every .png in srcDir becomes a .txt texture of the same base name in
 * dstDir. --sprite keeps fully transparent pixels as "."; --key-background
 * also keys out the top-left pixel's color.
 */

import { existsSync, mkdirSync, readdirSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import { parseArgs } from "node:util";
import { formatTexture, loadImageAsIntensity } from "../src/engine/assetLoader";
import type { ImageOptions } from "../src/engine/assetLoader";

// ============================================================
// Helpers
// ============================================================

function ensureDir(dir: string): void {
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
}

function parseSize(text: string): { width: number; height: number } {
  const match = /^(\d+)x(\d+)$/.exec(text);
  if (!match) throw new Error(`--size must look like 16x16, got "${text}"`);
  return { width: Number(match[1]), height: Number(match[2]) };
}

async function convertPng(src: string, dst: string, options: ImageOptions): Promise<boolean> {
  try {
    const tex = await loadImageAsIntensity(src, options);
    await writeFile(dst, formatTexture(tex), "utf8");
    return true;
  } catch (err) {
    console.warn(`  ERROR converting ${src}: ${String(err)}`);
    return false;
  }
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      size: { type: "string" },
      sprite: { type: "boolean", default: false },
      "key-background": { type: "boolean", default: false },
    },
    allowPositionals: true,
  });
  if (positionals.length !== 2) {
    console.error("Usage: tsx scripts/convert-assets.ts <srcDir> <dstDir> [--size WxH] [--sprite] [--key-background]");
    process.exitCode = 1;
    return;
  }

  const src = resolve(positionals[0]);
  const dst = resolve(positionals[1]);
  const options: ImageOptions = {
    ...(values.size === undefined ? {} : parseSize(values.size)),
    transparent: values.sprite,
    keyBackground: values["key-background"],
  };

  console.log("=== Glyphcaster Texture Converter ===\n");
  ensureDir(dst);

  const files = readdirSync(src).filter((f) => extname(f).toLowerCase() === ".png");
  let count = 0;
  for (const file of files) {
    const out = `${basename(file, extname(file))}.txt`;
    if (await convertPng(join(src, file), join(dst, out), options)) {
      count++;
      console.log(`  ✓ ${file} → ${out}`);
    }
  }

  if (files.length === 0) {
    console.warn(`  SKIP: no .png files in ${src}`);
  }
  console.log(`\n${count} of ${files.length} textures converted.`);
}

main().catch(console.error);
