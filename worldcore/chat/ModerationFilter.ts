// worldcore/chat/ModerationFilter.ts

import fs from "node:fs";
import path from "node:path";

import { Logger } from "../utils/logger";

const log = Logger.scope("CHAT");

export interface FilterResult {
  text: string;
  /** True when anything in the input had to be masked. */
  filtered: boolean;
}

/** Content filter contract. Only the returned text is ever delivered. */
export interface ModerationFilter {
  filter(text: string): FilterResult;
}

export const DEFAULT_TERMS_FILE = path.join(__dirname, "..", "data", "chat", "moderation_terms.json");

/** Reads `{ "terms": string[] }`. Missing or unreadable file yields []. */
export function loadModerationTerms(file = DEFAULT_TERMS_FILE): string[] {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (err) {
    log.warn("Moderation term list not readable; chat is unfiltered", { file, err });
    return [];
  }

  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || !("terms" in parsed) || !Array.isArray(parsed.terms)) {
    throw new Error(`moderation term list ${file} has no "terms" array`);
  }

  return parsed.terms.filter((t: unknown): t is string => typeof t === "string" && t.trim().length > 0);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Masks whole-word, case-insensitive matches with asterisks of the same
 * length. Control characters are stripped and whitespace collapsed first.
 */
export class WordListFilter implements ModerationFilter {
  private readonly pattern: RegExp | null;

  constructor(terms: readonly string[]) {
    const cleaned = terms.map((t) => t.trim().toLowerCase()).filter(Boolean);
    this.pattern = cleaned.length
      ? new RegExp(`\\b(?:${cleaned.map(escapeRegExp).join("|")})\\b`, "gi")
      : null;
  }

  filter(text: string): FilterResult {
    const normalized = text.replace(/[\u0000-\u001f\u007f]/g, "").replace(/\s+/g, " ").trim();
    if (!this.pattern) return { text: normalized, filtered: false };

    let filtered = false;
    const masked = normalized.replace(this.pattern, (m) => {
      filtered = true;
      return "*".repeat(m.length);
    });

    return { text: masked, filtered };
  }
}
