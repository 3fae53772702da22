import { describe, it, expect } from "vitest";
import { parseExitsLine, parseExitsList, isExitsLine } from "./exits.js";

describe("parseExitsLine", () => {
  it("parses the plain list form", () => {
    expect(parseExitsLine("Exits: north, south")).toEqual(["north", "south"]);
    expect(parseExitsLine("Exit: west")).toEqual(["west"]);
  });

  it("parses the bracketed form with aliases", () => {
    expect(parseExitsLine("[Exits: n s e]")).toEqual(["north", "south", "east"]);
    expect(parseExitsLine("[ Exits: up down ]")).toEqual(["up", "down"]);
  });

  it("parses obvious exits with noise words", () => {
    expect(parseExitsLine("Obvious exits: north and west")).toEqual(["north", "west"]);
    expect(parseExitsLine("Obvious exits: east or up")).toEqual(["east", "up"]);
  });

  it("parses the compact prompt form, counting closed doors", () => {
    expect(parseExitsLine("26H 100F 78V 91C T:75 Exits:N(S)E>")).toEqual(["north", "south", "east"]);
    expect(parseExitsLine("86H 109V 7563X Exits:UD> i")).toEqual(["up", "down"]);
  });

  it("reads a lone direction word as a word, not letters", () => {
    expect(parseExitsLine("Exits: east")).toEqual(["east"]);
    expect(parseExitsLine("Exits: up")).toEqual(["up"]);
    expect(parseExitsLine("Exits: ne sw")).toEqual(["ne", "sw"]);
  });

  it("reads two compact letters as two directions, not a diagonal", () => {
    expect(parseExitsLine("Exits:NW")).toEqual(["north", "west"]);
    expect(parseExitsLine("Exits:NE")).toEqual(["north", "east"]);
    expect(parseExitsLine("Exits:SW")).toEqual(["south", "west"]);
    expect(parseExitsLine("Exits:SE")).toEqual(["south", "east"]);
    expect(parseExitsLine("Exits:NW>")).toEqual(["north", "west"]);
  });

  it("de-duplicates in order of appearance", () => {
    expect(parseExitsLine("Exits: north, up, north, n")).toEqual(["north", "up"]);
  });

  it("returns empty for non-exit lines", () => {
    expect(parseExitsLine("Exits: none")).toEqual([]);
    expect(parseExitsLine("Exits: portal")).toEqual([]);
    expect(parseExitsLine("The exits are hidden.")).toEqual([]);
    expect(isExitsLine("A quiet room.")).toBe(false);
  });
});

describe("parseExitsList", () => {
  it("splits on commas and spaces", () => {
    expect(parseExitsList(" s,w , d ")).toEqual(["south", "west", "down"]);
  });

  it("treats a run of direction letters as compact", () => {
    expect(parseExitsList("NSD")).toEqual(["north", "south", "down"]);
    expect(parseExitsList("se")).toEqual(["south", "east"]);
  });

  it("returns empty for blank input", () => {
    expect(parseExitsList("   ")).toEqual([]);
  });
});
