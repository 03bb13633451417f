import type { HaikuMatch } from "./haiku-scanner";

/** One line: every token followed by a single space. */
export const formatHaiku = (match: HaikuMatch): string =>
  match.tokens.map(token => `${token} `).join("");

export const formatSummary = (total: number): string => `Found ${total} haikus.`;
