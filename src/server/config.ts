import path, { dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

// ────────────────  Runtime config (ENV‑driven)  ───────────────────────────
export const DICTIONARY_FILE =
  process.env.HAIKU_DICTIONARY_FILE ?? path.join(__dirname, "../../data/dictionary.txt");
export const TEXT_FILE = process.env.HAIKU_TEXT_FILE;
export const HTTP_PORT = Number(process.env.HTTP_PORT ?? 5500);
export const MAX_TEXT_BYTES = process.env.MAX_TEXT_BYTES ?? "1mb";
export const REST_ROOT = "/v1";
