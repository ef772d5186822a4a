import { readFileSync } from "node:fs";
import { z } from "zod";
import { packagePath } from "../config/paths.js";
import type { DirectoryRow, Professional } from "./types.js";

const aliasesSchema = z.record(z.string(), z.array(z.string()));

export type SpecialtyAliases = z.infer<typeof aliasesSchema>;

let cachedAliases: SpecialtyAliases | null = null;

export function loadSpecialtyAliases(): SpecialtyAliases {
  if (!cachedAliases) {
    const raw = readFileSync(packagePath("data/specialty-aliases.json"), "utf-8");
    cachedAliases = aliasesSchema.parse(JSON.parse(raw));
  }
  return cachedAliases;
}

const CITY_ARTICLES = ["los", "las", "la", "el"] as const;
const UNSPECIFIED = "No especificada";

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Search terms for a specialty: the input itself, the practitioner forms of a
 * "-logía" discipline (cardiología → cardiólogo, cardióloga, ...), and the
 * directory's own titles/specialties for known aliases.
 */
export function specialtyTerms(
  specialty: string,
  aliases: SpecialtyAliases = loadSpecialtyAliases(),
): string[] {
  const term = specialty.trim().toLowerCase();
  const terms = [term];

  const logia = /^(.*)log[ií]a$/.exec(term);
  if (logia?.[1]) {
    const stem = logia[1];
    terms.push(`${stem}logo`, `${stem}loga`);
    if (stem.endsWith("o")) {
      const bare = stem.slice(0, -1);
      terms.push(`${bare}ólogo`, `${bare}óloga`);
    }
  }

  terms.push(...(aliases[term] ?? []));
  return unique(terms);
}

/** "Los Lagos" also tries "lagos"; "Lagos" also tries "los lagos", "las lagos", ... */
export function cityTerms(city: string): string[] {
  const term = city.trim().toLowerCase();
  const terms = [term];

  const [first, ...rest] = term.split(/\s+/);
  const hasArticle = CITY_ARTICLES.some((article) => article === first);
  if (hasArticle && rest.length > 0) {
    terms.push(rest.join(" "));
  } else if (!hasArticle) {
    terms.push(...CITY_ARTICLES.map((article) => `${article} ${term}`));
  }

  return unique(terms);
}

function cell(row: DirectoryRow, column: string): string {
  return (row[column] ?? "").toLowerCase();
}

/** Rows whose specialty or title matches the specialty and whose coverage area matches the city. */
export function findProfessionals(
  rows: readonly DirectoryRow[],
  specialty: string,
  city: string,
  aliases?: SpecialtyAliases,
): DirectoryRow[] {
  const specialtyList = specialtyTerms(specialty, aliases);
  const cityList = cityTerms(city);

  return rows.filter((row) => {
    const specialtyText = cell(row, "specialty");
    const titleText = cell(row, "title");
    const coverage = cell(row, "coverage_area");

    const professionalMatch = specialtyList.some(
      (t) => specialtyText.includes(t) || titleText.includes(t),
    );
    return professionalMatch && cityList.some((t) => coverage.includes(t));
  });
}

/** First row whose name contains the query, or is contained in it. */
export function findProfessionalByName(
  rows: readonly DirectoryRow[],
  name: string,
): Professional | null {
  const query = name.trim().toLowerCase();
  if (!query) return null;

  for (const row of rows) {
    const candidate = cell(row, "name").trim();
    if (!candidate) continue;
    if (candidate.includes(query) || query.includes(candidate)) {
      return { ...row, availability: row["availability"] || UNSPECIFIED };
    }
  }
  return null;
}
