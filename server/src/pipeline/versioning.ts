import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { InputError, NotFoundError } from "../errors.js";
import { companyDirAbs, nowIso, tryReadJsonFile, writeJsonFile } from "./utils.js";

const VERSION_RE = /^v(\d+)\.(\d+)\.(\d+)$/;

export const INITIAL_VERSION = "v0.0.1";

export type MemoVersion = { major: number; minor: number; patch: number };

export const VersionEntrySchema = z.object({
  version: z.string().regex(VERSION_RE),
  createdAt: z.string(),
  source: z.enum(["generate", "correction"]),
  derivedFrom: z.string().regex(VERSION_RE).nullable().default(null)
});

export const VersionLedgerSchema = z.object({
  company: z.string(),
  latest: z.string().regex(VERSION_RE),
  history: z.array(VersionEntrySchema)
});

export type VersionEntry = z.infer<typeof VersionEntrySchema>;
export type VersionLedger = z.infer<typeof VersionLedgerSchema>;

export function parseVersion(tag: string): MemoVersion {
  const m = VERSION_RE.exec(tag.trim());
  if (!m) throw new InputError(`Invalid version tag "${tag}" (expected vX.Y.Z)`);
  return { major: Number(m[1]), minor: Number(m[2]), patch: Number(m[3]) };
}

export function isVersionTag(tag: string): boolean {
  return VERSION_RE.test(tag);
}

export function formatVersion(v: MemoVersion): string {
  return `v${v.major}.${v.minor}.${v.patch}`;
}

export function incrementPatch(tag: string): string {
  const v = parseVersion(tag);
  return formatVersion({ ...v, patch: v.patch + 1 });
}

export function compareVersions(a: string, b: string): number {
  const va = parseVersion(a);
  const vb = parseVersion(b);
  return va.major - vb.major || va.minor - vb.minor || va.patch - vb.patch;
}

function ledgerPath(companySlug: string): string {
  return path.join(companyDirAbs(companySlug), "versions.json");
}

async function versionDirsOnDisk(companySlug: string): Promise<string[]> {
  const entries = await fs.readdir(companyDirAbs(companySlug), { withFileTypes: true }).catch(() => []);
  return entries
    .filter((e) => e.isDirectory() && isVersionTag(e.name))
    .map((e) => e.name)
    .sort(compareVersions);
}

/**
 * Loads `versions.json`; when it is missing but version folders exist, a ledger is
 * rebuilt from the folder names so older output trees stay addressable.
 */
export async function loadLedger(companySlug: string): Promise<VersionLedger | null> {
  const stored = await tryReadJsonFile(ledgerPath(companySlug), VersionLedgerSchema);
  if (stored) return stored;

  const dirs = await versionDirsOnDisk(companySlug);
  if (dirs.length === 0) return null;
  return {
    company: companySlug,
    latest: dirs[dirs.length - 1],
    history: dirs.map((version) => ({ version, createdAt: nowIso(), source: "generate" as const, derivedFrom: null }))
  };
}

const locks = new Map<string, Promise<unknown>>();

async function withCompanyLock<T>(companySlug: string, fn: () => Promise<T>): Promise<T> {
  const prev = locks.get(companySlug) ?? Promise.resolve();
  const next = prev.catch(() => undefined).then(fn);
  locks.set(companySlug, next);
  try {
    return await next;
  } finally {
    if (locks.get(companySlug) === next) locks.delete(companySlug);
  }
}

/**
 * Reserves the next patch version for a company and records it as latest.
 */
export async function allocateVersion(
  companySlug: string,
  source: VersionEntry["source"],
  derivedFrom: string | null = null
): Promise<string> {
  return await withCompanyLock(companySlug, async () => {
    const ledger = await loadLedger(companySlug);
    const onDisk = await versionDirsOnDisk(companySlug);
    const known = [...(ledger?.history.map((h) => h.version) ?? []), ...onDisk].sort(compareVersions);
    const highest = known.length > 0 ? known[known.length - 1] : null;
    const version = highest ? incrementPatch(highest) : INITIAL_VERSION;

    const next: VersionLedger = {
      company: companySlug,
      latest: version,
      history: [...(ledger?.history ?? []), { version, createdAt: nowIso(), source, derivedFrom }]
    };
    await writeJsonFile(ledgerPath(companySlug), next);
    return version;
  });
}

export async function resolveVersion(companySlug: string, requested?: string | null): Promise<string> {
  const ledger = await loadLedger(companySlug);
  if (!ledger) throw new NotFoundError(`No memo versions found for "${companySlug}"`);
  if (!requested || requested === "latest") return ledger.latest;

  parseVersion(requested);
  const exists = ledger.history.some((h) => h.version === requested) || (await versionDirsOnDisk(companySlug)).includes(requested);
  if (!exists) throw new NotFoundError(`Version ${requested} not found for "${companySlug}"`);
  return requested;
}
