/**
 * Split decompressed PGN text into one raw segment per game.
 *
 * A game opens at `[Event` and closes at the first line that ends in a result
 * token (`1-0`, `0-1`, `1/2-1/2`) standing on its own word. Scanning is line by
 * line so that `[Result "1-0"]` headers and results quoted mid-line inside
 * comments never close a game early.
 *
 * Segments that never reach a result token are dropped: either the archive ends
 * first, or the next `[Event` line arrives first (how unfinished `*` games show
 * up). Both cases are counted in `stats.droppedUnterminated`.
 */

export const START_TOKEN = "[Event";
export const TERMINAL_TOKENS = ["1-0", "0-1", "1/2-1/2"] as const;

export interface SplitStats {
  games: number;
  droppedUnterminated: number;
}

/**
 * Offset just past the result token when `line` closes a game, else -1.
 * Trailing whitespace (including a CR) is ignored.
 */
export function terminalEnd(line: string): number {
  const trimmed = line.trimEnd();
  for (const token of TERMINAL_TOKENS) {
    if (!trimmed.endsWith(token)) continue;
    const before = trimmed.length - token.length;
    if (before === 0 || /\s/.test(trimmed[before - 1])) return trimmed.length;
  }
  return -1;
}

export class GameSplitter {
  readonly stats: SplitStats = { games: 0, droppedUnterminated: 0 };

  private buffer = "";
  private inGame = false;
  // Offset of the next line to examine while inside a game. Always a line start.
  private lineStart = 0;

  /** Feed more text; returns every game completed by it. */
  push(text: string): string[] {
    this.buffer += text;
    return this.scan(false);
  }

  /** Flush at end of input. A trailing unfinished game is dropped. */
  end(): string[] {
    const out = this.scan(true);
    if (this.inGame) this.stats.droppedUnterminated++;
    this.buffer = "";
    this.inGame = false;
    this.lineStart = 0;
    return out;
  }

  private scan(final: boolean): string[] {
    const out: string[] = [];
    for (;;) {
      if (!this.inGame) {
        const start = this.buffer.indexOf(START_TOKEN);
        if (start === -1) {
          // Keep a tail long enough to hold a start token cut across chunks
          this.buffer = final ? "" : this.buffer.slice(-(START_TOKEN.length - 1));
          return out;
        }
        this.buffer = this.buffer.slice(start);
        this.inGame = true;
        this.lineStart = 0;
      }

      const segment = this.scanGame(final);
      if (segment === null) return out;
      out.push(segment);
      this.stats.games++;
    }
  }

  /** Finished segment, or null when the game needs more input. */
  private scanGame(final: boolean): string | null {
    for (;;) {
      const newline = this.buffer.indexOf("\n", this.lineStart);
      if (newline === -1 && !final) return null;

      const lineEnd = newline === -1 ? this.buffer.length : newline;
      const line = this.buffer.slice(this.lineStart, lineEnd);

      if (this.lineStart > 0 && line.startsWith(START_TOKEN)) {
        this.stats.droppedUnterminated++;
        this.buffer = this.buffer.slice(this.lineStart);
        this.lineStart = 0;
        continue;
      }

      const end = terminalEnd(line);
      if (end !== -1) {
        const segment = this.buffer.slice(0, this.lineStart + end);
        this.buffer = newline === -1 ? "" : this.buffer.slice(newline + 1);
        this.inGame = false;
        this.lineStart = 0;
        return segment;
      }

      if (newline === -1) {
        this.lineStart = this.buffer.length;
        return null;
      }
      this.lineStart = newline + 1;
    }
  }
}

/** Lazily split a stream of text chunks into game segments, in archive order. */
export async function* splitGames(
  chunks: AsyncIterable<string>,
  splitter: GameSplitter = new GameSplitter(),
): AsyncGenerator<string> {
  for await (const text of chunks) {
    yield* splitter.push(text);
  }
  yield* splitter.end();
}

/** Split a whole PGN string held in memory. */
export function splitPGN(pgnText: string): string[] {
  const splitter = new GameSplitter();
  return [...splitter.push(pgnText), ...splitter.end()];
}
