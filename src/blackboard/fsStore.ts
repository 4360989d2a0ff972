import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";

export function sanitizeName(name: unknown, fallback = "anonymous"): string {
  if (name === undefined || name === null || name === "") return fallback;
  const cleaned = String(name).replace(/\W+/g, "_").replace(/^_+|_+$/g, "").toLowerCase();
  return cleaned || fallback;
}

export function saveArtifact(dir: string, fileName: string, content: string): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, content, "utf-8");
  return path;
}

export function readArtifact(dir: string, fileName: string): string | undefined {
  const path = join(dir, fileName);
  if (!existsSync(path)) return undefined;
  return readFileSync(path, "utf-8");
}
