import { describe, it, expect } from "vitest";
import {
  cityTerms,
  findProfessionalByName,
  findProfessionals,
  loadSpecialtyAliases,
  specialtyTerms,
} from "../../src/directory/search.js";
import { DIRECTORY_ROWS } from "../helpers/fixtures.js";

describe("specialtyTerms", () => {
  it("derives practitioner forms of a -logía discipline", () => {
    expect(specialtyTerms("  Cardiología ", {})).toEqual([
      "cardiología",
      "cardiologo",
      "cardiologa",
      "cardiólogo",
      "cardióloga",
    ]);
  });

  it("accepts the unaccented spelling", () => {
    expect(specialtyTerms("oncologia", {})).toEqual([
      "oncologia",
      "oncologo",
      "oncologa",
      "oncólogo",
      "oncóloga",
    ]);
  });

  it("appends aliases without duplicating terms", () => {
    expect(specialtyTerms("Kinesiología", { "kinesiología": ["kinesiólogo"] })).toEqual([
      "kinesiología",
      "kinesiologo",
      "kinesiologa",
      "kinesiólogo",
      "kinesióloga",
    ]);
  });

  it("uses the bundled alias table by default", () => {
    expect(loadSpecialtyAliases()["enfermera"]).toEqual(["enfermera", "tens"]);
    expect(specialtyTerms("Enfermera")).toEqual(["enfermera", "tens"]);
  });
});

describe("cityTerms", () => {
  it("tries an article-free city with each article", () => {
    expect(cityTerms("Lagos")).toEqual(["lagos", "los lagos", "las lagos", "la lagos", "el lagos"]);
  });

  it("also tries a city without its leading article", () => {
    expect(cityTerms("Los Ángeles")).toEqual(["los ángeles", "ángeles"]);
  });

  it("keeps a bare article as is", () => {
    expect(cityTerms("La")).toEqual(["la"]);
  });
});

describe("findProfessionals", () => {
  it("matches specialty and coverage area", () => {
    expect(findProfessionals(DIRECTORY_ROWS, "Kinesiología", "Providencia")).toEqual([
      DIRECTORY_ROWS[0],
    ]);
  });

  it("matches through aliases against the title column", () => {
    expect(findProfessionals(DIRECTORY_ROWS, "enfermera", "Condes")).toEqual([DIRECTORY_ROWS[2]]);
  });

  it("matches a city given without its article", () => {
    expect(findProfessionals(DIRECTORY_ROWS, "cardiólogo", "Ángeles")).toEqual([
      DIRECTORY_ROWS[1],
    ]);
  });

  it("returns nothing when the city is not covered", () => {
    expect(findProfessionals(DIRECTORY_ROWS, "Kinesiología", "Arica")).toEqual([]);
  });
});

describe("findProfessionalByName", () => {
  it("defaults missing availability", () => {
    expect(findProfessionalByName(DIRECTORY_ROWS, "bruno")).toEqual({
      ...DIRECTORY_ROWS[1],
      availability: "No especificada",
    });
  });

  it("matches when the query contains the full name", () => {
    expect(findProfessionalByName(DIRECTORY_ROWS, "Dra. Ana Rojas Pérez")).toEqual({
      ...DIRECTORY_ROWS[0],
      availability: "Lunes a viernes",
    });
  });

  it("skips rows without a name", () => {
    expect(findProfessionalByName(DIRECTORY_ROWS, "tens")).toBeNull();
  });

  it("returns null for an empty query", () => {
    expect(findProfessionalByName(DIRECTORY_ROWS, "   ")).toBeNull();
  });
});
