/**
 * Turn one raw game segment into a ParsedGame.
 *
 * No move validation happens here: the move text is carried verbatim (result
 * token included) for the warehouse to deal with.
 */

import { MalformedGameError } from "./errors";
import { randomIdSource } from "./id-source";
import { GAME_ID_FIELD, MOVES_FIELD, type IdSource, type ParsedGame } from "./types";

// [Name "Value"] on a line of its own; values may escape \" and \\
const TAG_LINE = /^\s*\[([A-Za-z_][A-Za-z0-9_]*)\s+"((?:[^"\\]|\\.)*)"\s*\]\s*$/;
const BLANK_LINE = /\r?\n[ \t]*\r?\n/;

function unescapeValue(raw: string): string {
  return raw.replace(/\\(["\\])/g, "$1");
}

/** Header tags in first-encounter order; a repeated name keeps the last value. */
export function extractTags(segment: string): Map<string, string> {
  const tags = new Map<string, string>();
  for (const line of segment.split(/\r?\n/)) {
    const match = TAG_LINE.exec(line);
    if (match) tags.set(match[1], unescapeValue(match[2]));
  }
  return tags;
}

/**
 * Move text: everything after the first blank line. Without one, every line
 * that is not a header line, in order.
 */
export function extractMoves(segment: string): string {
  const separator = BLANK_LINE.exec(segment);
  if (separator) {
    return segment.slice(separator.index + separator[0].length).trim();
  }
  return segment
    .split(/\r?\n/)
    .filter((line) => !line.startsWith("["))
    .join("\n")
    .trim();
}

function excerpt(segment: string): string {
  const firstLine = segment.split("\n", 1)[0].trim();
  return firstLine.length > 80 ? `${firstLine.slice(0, 77)}...` : firstLine;
}

export function parseGame(segment: string, ids: IdSource = randomIdSource): ParsedGame {
  const tags = extractTags(segment);
  if (tags.size === 0) {
    throw new MalformedGameError("no header tags", excerpt(segment));
  }
  // Generated fields win over same-named tags; record keys stay tags, moves, game_id
  tags.delete(MOVES_FIELD);
  tags.delete(GAME_ID_FIELD);
  return { gameId: ids.next(), tags, moves: extractMoves(segment) };
}

/** Field names of the flat record: tags, then moves, then game_id. */
export function recordKeys(game: ParsedGame): string[] {
  return [...game.tags.keys(), MOVES_FIELD, GAME_ID_FIELD];
}

export function toRecord(game: ParsedGame): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [name, value] of game.tags) record[name] = value;
  record[MOVES_FIELD] = game.moves;
  record[GAME_ID_FIELD] = game.gameId;
  return record;
}
