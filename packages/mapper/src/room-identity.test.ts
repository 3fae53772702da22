import { describe, it, expect } from "vitest";
import { generateRoomId, extractFirstSentence, contentSignature } from "./room-identity.js";

describe("generateRoomId", () => {
  it("joins lower-cased title, first sentence and sorted exits", () => {
    expect(generateRoomId("Temple Square", "A wide plaza. Pigeons gather.", ["south", "north"]))
      .toBe("temple square|a wide plaza.|north,south");
  });

  it("appends the distance when given", () => {
    expect(generateRoomId("Temple Square", "A wide plaza.", ["north"], 3))
      .toBe("temple square|a wide plaza.|north|3");
    expect(generateRoomId("Temple Square", "A wide plaza.", ["north"], 0))
      .toBe("temple square|a wide plaza.|north|0");
  });

  it("does not depend on exit order", () => {
    const exits = ["up", "east", "north", "west"];
    const expected = generateRoomId("Hall", "Tall.", exits, 2);
    expect(generateRoomId("Hall", "Tall.", [...exits].reverse(), 2)).toBe(expected);
    expect(generateRoomId("Hall", "Tall.", ["west", "up", "north", "east"], 2)).toBe(expected);
  });

  it("distinguishes identical rooms at different distances", () => {
    expect(generateRoomId("Hall", "Tall.", ["east"], 1)).not.toBe(generateRoomId("Hall", "Tall.", ["east"], 2));
  });
});

describe("extractFirstSentence", () => {
  it("prefers a period over an earlier exclamation or question mark", () => {
    expect(extractFirstSentence("  Dark here! Very dark. ")).toBe("Dark here! Very dark.");
    expect(extractFirstSentence("Wow! It is dark. Here")).toBe("Wow! It is dark.");
    expect(extractFirstSentence("Is it? Yes. Maybe.")).toBe("Is it? Yes.");
  });

  it("falls back to an exclamation before a question mark", () => {
    expect(extractFirstSentence("Where? Here! Now")).toBe("Where? Here!");
    expect(extractFirstSentence("Who goes there? Nobody")).toBe("Who goes there?");
  });

  it("feeds the chosen sentence into the room ID", () => {
    expect(generateRoomId("Cellar", "Wow! It is dark. Here", ["up"])).toBe("cellar|wow! it is dark.|up");
  });

  it("falls back to the first line, then the whole text", () => {
    expect(extractFirstSentence("First line\nsecond line")).toBe("First line");
    expect(extractFirstSentence("No terminator")).toBe("No terminator");
    expect(extractFirstSentence("   ")).toBe("");
  });
});

describe("contentSignature", () => {
  it("strips a trailing distance", () => {
    expect(contentSignature("hall|tall.|east|12")).toBe("hall|tall.|east");
    expect(contentSignature("hall|tall.||0")).toBe("hall|tall.|");
  });

  it("leaves IDs without a distance alone", () => {
    expect(contentSignature("hall|tall.|east")).toBe("hall|tall.|east");
  });
});
