import { describe, it, expect, vi } from "vitest";
import { ProfessionalDirectory } from "../../src/directory/directory.js";
import { recordsFromValues } from "../../src/directory/sheets.js";
import { DIRECTORY_ROWS, FakeSheetSource, silentLogger } from "../helpers/fixtures.js";

describe("recordsFromValues", () => {
  it("keys rows by the trimmed header and skips blank rows", () => {
    const records = recordsFromValues([
      ["name", "specialty", " coverage_area "],
      ["Ana", "Kinesiología"],
      ["", "", ""],
      ["Bruno", "Cardiología", "Los Ángeles", "sobra"],
    ]);

    expect(records).toEqual([
      { name: "Ana", specialty: "Kinesiología", coverage_area: "" },
      { name: "Bruno", specialty: "Cardiología", coverage_area: "Los Ángeles" },
    ]);
  });

  it("returns no records for an empty sheet", () => {
    expect(recordsFromValues([])).toEqual([]);
  });
});

describe("ProfessionalDirectory", () => {
  it("searches the configured tab", async () => {
    const source = new FakeSheetSource({ directory: DIRECTORY_ROWS });
    const directory = new ProfessionalDirectory(source, "directory", silentLogger());

    await expect(directory.findProfessionals("Kinesiología", "Ñuñoa")).resolves.toEqual([
      DIRECTORY_ROWS[0],
    ]);
    expect(source.reads).toEqual(["directory"]);
  });

  it("finds a professional by name", async () => {
    const source = new FakeSheetSource({ directory: DIRECTORY_ROWS });
    const directory = new ProfessionalDirectory(source, "directory", silentLogger());

    const found = await directory.findByName("carla soto");

    expect(found?.phone).toBe("+56 9 1111 0003");
  });

  it("degrades to empty results when the sheet cannot be read", async () => {
    const logger = silentLogger();
    const errorSpy = vi.spyOn(logger, "error");
    const source = new FakeSheetSource({ directory: DIRECTORY_ROWS });
    source.error = new Error("quota exceeded");
    const directory = new ProfessionalDirectory(source, "directory", logger);

    await expect(directory.findProfessionals("Kinesiología", "Providencia")).resolves.toEqual([]);
    await expect(directory.findByName("Ana")).resolves.toBeNull();
    expect(errorSpy).toHaveBeenCalledTimes(2);
  });
});
