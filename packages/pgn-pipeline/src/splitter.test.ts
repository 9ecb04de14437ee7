import { describe, expect, it } from "vitest";
import { GameSplitter, splitGames, splitPGN, terminalEnd } from "./splitter";
import { GAME_ONE, GAME_TWO, chunksOf, collect } from "./test-helpers";

describe("terminalEnd", () => {
  it("finds a result token at the end of a move line", () => {
    expect(terminalEnd("1. e4 e5 1-0")).toBe(12);
    expect(terminalEnd("0-1")).toBe(3);
    expect(terminalEnd("34. Kf2 1/2-1/2")).toBe(15);
  });

  it("ignores trailing whitespace and carriage returns", () => {
    expect(terminalEnd("1. e4 1-0  \r")).toBe(9);
  });

  it("requires the token to stand on its own", () => {
    expect(terminalEnd("1. e4 21-0")).toBe(-1);
    expect(terminalEnd('[Result "1-0"]')).toBe(-1);
    expect(terminalEnd("1. e4 *")).toBe(-1);
  });
});

describe("splitPGN", () => {
  it("splits games separated by blank lines", () => {
    expect(splitPGN(`${GAME_ONE}\n\n${GAME_TWO}\n`)).toEqual([GAME_ONE, GAME_TWO]);
  });

  it("ignores text before the first game", () => {
    expect(splitPGN(`garbage header\n\n${GAME_ONE}\n`)).toEqual([GAME_ONE]);
  });

  it("closes a final game that has no trailing newline", () => {
    expect(splitPGN(GAME_ONE)).toEqual([GAME_ONE]);
  });

  it("does not close a game on a result quoted in a tag or a comment", () => {
    const pgn = '[Event "C"]\n[Result "1-0"]\n\n1. e4 {1-0 was offered} e5\n2. Nf3 1/2-1/2\n';
    expect(splitPGN(pgn)).toEqual(['[Event "C"]\n[Result "1-0"]\n\n1. e4 {1-0 was offered} e5\n2. Nf3 1/2-1/2']);
  });

  it("excludes the line break after the result token", () => {
    expect(splitPGN('[Event "A"]\r\n\r\n1. e4 1-0\r\n')).toEqual(['[Event "A"]\r\n\r\n1. e4 1-0']);
  });

  it("returns nothing for text without games", () => {
    expect(splitPGN("")).toEqual([]);
    expect(splitPGN("no games here\n")).toEqual([]);
  });
});

describe("GameSplitter", () => {
  it("drops an unfinished game when the next one starts", () => {
    const splitter = new GameSplitter();
    const pgn = `[Event "Open"]\n[Result "*"]\n\n1. e4 *\n\n${GAME_TWO}\n`;

    const games = [...splitter.push(pgn), ...splitter.end()];

    expect(games).toEqual([GAME_TWO]);
    expect(splitter.stats).toEqual({ games: 1, droppedUnterminated: 1 });
  });

  it("drops a game cut off by the end of input", () => {
    const splitter = new GameSplitter();

    const games = [...splitter.push(`${GAME_ONE}\n\n[Event "Cut"]\n\n1. e4`), ...splitter.end()];

    expect(games).toEqual([GAME_ONE]);
    expect(splitter.stats).toEqual({ games: 1, droppedUnterminated: 1 });
  });

  it("gives the same games however the text is chunked", () => {
    const pgn = `${GAME_ONE}\n\n${GAME_TWO}\n`;
    const splitter = new GameSplitter();
    const games: string[] = [];
    for (const ch of pgn) games.push(...splitter.push(ch));
    games.push(...splitter.end());

    expect(games).toEqual([GAME_ONE, GAME_TWO]);
    expect(splitter.stats.games).toBe(2);
  });
});

describe("splitGames", () => {
  it("yields games from a stream of text chunks in order", async () => {
    const pgn = `${GAME_ONE}\n\n${GAME_TWO}\n`;
    const mid = pgn.indexOf("[Event", 10) + 3; // inside the second start token
    const games = await collect(splitGames(chunksOf([pgn.slice(0, 40), pgn.slice(40, mid), pgn.slice(mid)])));
    expect(games).toEqual([GAME_ONE, GAME_TWO]);
  });
});
