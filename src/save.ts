import { writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import Papa from "papaparse";
import { config } from "./config";

export async function saveJson<T>(rows: T[], filename: string, dir = config.OUTPUT_DIR) {
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  await writeFile(path, JSON.stringify(rows, null, 2), "utf-8");
  return path;
}

export function toCsv<T extends object>(rows: T[]): string {
  if (rows.length === 0) return "";
  return Papa.unparse(rows, { quotes: false, header: true, newline: "\n" });
}

export async function saveCsv<T extends object>(rows: T[], filename: string, dir = config.OUTPUT_DIR) {
  await mkdir(dir, { recursive: true });
  const path = join(dir, filename);
  await writeFile(path, toCsv(rows), "utf-8");
  return path;
}

export function makeFilename(label: string, url: string, ext: "json" | "csv", now = new Date()): string {
  const date = now.toISOString().slice(0, 10);
  let host: string;
  try {
    host = new URL(url).host;
  } catch {
    host = url;
  }
  const slug = host
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_|_$/g, "")
    .slice(0, 60);
  return `${date} ${slug} ${label}.${ext}`;
}
