import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

type UtcParts = { yyyy: string; mm: string; dd: string; hh: string; mi: string; ss: string };

function utcParts(d: Date): UtcParts {
  return {
    yyyy: String(d.getUTCFullYear()),
    mm: String(d.getUTCMonth() + 1).padStart(2, "0"),
    dd: String(d.getUTCDate()).padStart(2, "0"),
    hh: String(d.getUTCHours()).padStart(2, "0"),
    mi: String(d.getUTCMinutes()).padStart(2, "0"),
    ss: String(d.getUTCSeconds()).padStart(2, "0"),
  };
}

export function defaultBuildNumber(d: Date = new Date()): string {
  // YYYYMMDDHHMMSS
  const p = utcParts(d);
  return `${p.yyyy}${p.mm}${p.dd}${p.hh}${p.mi}${p.ss}`;
}

export function formatBomTimestamp(d: Date): string {
  // YYYY-MM-DD HH:MM:SS
  const p = utcParts(d);
  return `${p.yyyy}-${p.mm}-${p.dd} ${p.hh}:${p.mi}:${p.ss}`;
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}
