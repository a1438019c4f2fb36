/**
 * JSON store: persists collected documents and assembled inventories.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { COLLECTION_FILES, type CollectionDocuments } from "../collections.js";
import { ENTITY_KINDS } from "../records.js";
import type { AssemblyResult } from "../types.js";

export function serializeJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

/** Write the five collection documents into `dir`; returns the written paths. */
export async function saveCollections(dir: string, documents: CollectionDocuments): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const paths: string[] = [];
  for (const kind of ENTITY_KINDS) {
    const filePath = join(dir, COLLECTION_FILES[kind]);
    await writeFile(filePath, serializeJson(documents[kind]), "utf-8");
    paths.push(filePath);
  }
  return paths;
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function inventoryFileName(now: Date): string {
  return `inventory_${formatTimestamp(now)}.json`;
}

export function serializeInventory(result: AssemblyResult): string {
  return serializeJson({ inventory: result.inventory, statistics: result.statistics });
}

/** Write `{ inventory, statistics }` to a timestamped file in `dir`. */
export async function saveInventory(dir: string, result: AssemblyResult, now: Date = new Date()): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = join(dir, inventoryFileName(now));
  await writeFile(filePath, serializeInventory(result), "utf-8");
  return filePath;
}
