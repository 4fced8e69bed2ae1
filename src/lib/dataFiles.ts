// ============================================
// Data files — static lists shipped under data/
// ============================================

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** data/ sits two levels above this module in both src/ and dist/src/ layouts */
const DATA_DIR = path.resolve(__dirname, "..", "..", "data");

function readStringList(fileName: string): readonly string[] {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(DATA_DIR, fileName), "utf-8"));
  if (!Array.isArray(raw) || !raw.every((entry): entry is string => typeof entry === "string")) {
    throw new Error(`Data file ${fileName} must contain a JSON array of strings`);
  }
  return Object.freeze(raw);
}

/** Slack filetypes whose content is readable as plain text */
export const PLAIN_TEXT_FILETYPES: readonly string[] = readStringList("plain-text-filetypes.json");

/** UTC offsets a workspace or channel may select, in "+HH:MM" form */
export const TIMEZONE_OFFSETS: readonly string[] = readStringList("timezone-offsets.json");
