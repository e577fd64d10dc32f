import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export type Parser<T> = { parse: (value: unknown) => T };

export function nowIso(): string {
  return new Date().toISOString();
}

export function repoRoot(): string {
  // This file lives at server/src/pipeline/utils.ts
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

export function outputRootAbs(): string {
  const env = process.env.MEMO_OUTPUT_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "output");
}

export function dataRootAbs(): string {
  const env = process.env.MEMO_DATA_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "data");
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}

export function companyDirAbs(companySlug: string): string {
  return path.join(outputRootAbs(), companySlug);
}

export function runDirAbs(companySlug: string, version: string): string {
  return path.join(companyDirAbs(companySlug), version);
}

export function runIdFor(companySlug: string, version: string): string {
  return `${companySlug}-${version}`;
}

export function parseRunId(runId: string): { companySlug: string; version: string } | null {
  const m = /^([a-z0-9][a-z0-9-]*)-(v\d+\.\d+\.\d+)$/.exec(runId);
  if (!m) return null;
  return { companySlug: m[1], version: m[2] };
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function readJsonFile<T>(filePath: string, schema: Parser<T>): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  const data: unknown = JSON.parse(raw);
  return schema.parse(data);
}

export async function tryReadJsonFile<T>(filePath: string, schema: Parser<T>): Promise<T | null> {
  try {
    return await readJsonFile(filePath, schema);
  } catch {
    return null;
  }
}

export async function tryReadTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch {
    return null;
  }
}

export async function copyDir(src: string, dst: string): Promise<void> {
  await fs.cp(src, dst, { recursive: true, errorOnExist: true, force: false });
}

/**
 * Artifact names are paths relative to the run root, at most one directory deep
 * (e.g. `2-sections/01-executive-summary.md`).
 */
export function isSafeArtifactName(name: string): boolean {
  if (name.includes("\\") || name.includes("..")) return false;
  const parts = name.split("/");
  if (parts.length > 2) return false;
  return parts.every((p) => /^[A-Za-z0-9._-]+$/.test(p));
}

export async function listFilesRecursive(dir: string, prefix = ""): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
  const out: string[] = [];
  for (const ent of entries) {
    const rel = prefix ? `${prefix}/${ent.name}` : ent.name;
    if (ent.isDirectory()) out.push(...(await listFilesRecursive(path.join(dir, ent.name), rel)));
    else if (ent.isFile() && !ent.name.includes(".tmp.")) out.push(rel);
  }
  return out.sort();
}

export function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("Cancelled"));
      return;
    }
    if (ms <= 0) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
      reject(new Error("Cancelled"));
    };

    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal.addEventListener("abort", onAbort, { once: true });
  });
}
