import { describe, it, expect } from "vitest";
import {
  combineFragments,
  continuesIntoNext,
  isGreeting,
  splitClauses,
} from "../../src/batching/combiner.js";

describe("combineFragments", () => {
  it("returns a single fragment unchanged", () => {
    expect(combineFragments(["  ¡Hola!  "])).toBe("  ¡Hola!  ");
  });

  it("returns an empty string for no fragments", () => {
    expect(combineFragments([])).toBe("");
  });

  it("joins fragments with single spaces in arrival order", () => {
    expect(combineFragments(["hola", "necesito un kinesiólogo", "en Providencia"])).toBe(
      "hola necesito un kinesiólogo en Providencia",
    );
  });

  it("keeps duplicate fragments", () => {
    expect(combineFragments(["sí", "sí", "gracias", "gracias"])).toBe("sí sí gracias gracias");
  });

  it("keeps a trailing connective fragment", () => {
    expect(combineFragments(["quiero", "ir a"])).toBe("quiero ir a");
  });
});

describe("splitClauses", () => {
  it("sets greetings apart and holds fragments that end on a connective", () => {
    expect(
      splitClauses(["hola", "necesito un kinesiólogo para", "mi mamá", "gracias"]),
    ).toEqual(["hola", "necesito un kinesiólogo para mi mamá", "gracias"]);
  });

  it("flushes a pending run before a greeting", () => {
    expect(splitClauses(["busco enfermera en", "Buenas tardes", "Las Condes"])).toEqual([
      "busco enfermera en",
      "Buenas tardes",
      "Las Condes",
    ]);
  });
});

describe("isGreeting", () => {
  it("matches greetings regardless of case and punctuation", () => {
    expect(isGreeting("¡Hola!")).toBe(true);
    expect(isGreeting("Buenas   tardes.")).toBe(true);
    expect(isGreeting("THANK YOU")).toBe(true);
  });

  it("does not match longer sentences", () => {
    expect(isGreeting("hola doctor")).toBe(false);
  });
});

describe("continuesIntoNext", () => {
  it("detects a fragment ending on a preposition or article", () => {
    expect(continuesIntoNext("busco kinesiólogo en")).toBe(true);
    expect(continuesIntoNext("looking for a nurse in")).toBe(true);
  });

  it("treats complete fragments as finished", () => {
    expect(continuesIntoNext("en Providencia")).toBe(false);
    expect(continuesIntoNext("")).toBe(false);
  });
});
