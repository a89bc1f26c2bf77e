import { describe, it, expect } from "vitest";
import {
  CatalogStore,
  deriveProductName,
  loadCatalogFile,
  parseCatalogCsv,
  resolveProduct,
  type ProductRecord,
} from "./catalog";
import { LoadError } from "./errors";

const CANONICAL_CSV = [
  "Description,UsageInstructions,Advantages,Presentation",
  "Floss X: waxed floss,Use daily,Strong,30m roll",
  "Brush Soft: soft bristles,Brush twice a day,Gentle on gums,Pack of 2",
].join("\n");

function record(fields: { Name: string; Description: string; Advantages?: string }): ProductRecord {
  return { UsageInstructions: "u", Advantages: "a", Presentation: "p", ...fields };
}

describe("parseCatalogCsv()", () => {
  it("maps canonical columns and derives names from the description", () => {
    const catalog = parseCatalogCsv(CANONICAL_CSV, "test");

    expect(catalog.source).toBe("test");
    expect(catalog.records).toHaveLength(2);
    expect(catalog.records[0]).toEqual({
      Name: "Floss X",
      Description: "Floss X: waxed floss",
      UsageInstructions: "Use daily",
      Advantages: "Strong",
      Presentation: "30m roll",
    });
    expect(catalog.records[1].Name).toBe("Brush Soft");
  });

  it("accepts the localized headers, with a byte order mark", () => {
    const csv = "\uFEFFDescripción,Instrucciones de Uso,Ventajas,Presentación,Precio\nHilo: encerado,Diario,Resistente,Rollo,3.50";
    const [first] = parseCatalogCsv(csv, "es").records;

    expect(first.Name).toBe("Hilo");
    expect(first.UsageInstructions).toBe("Diario");
    expect(first.Presentation).toBe("Rollo");
    expect(first.Precio).toBe("3.50");
  });

  it("prefers an explicit Name column", () => {
    const csv = "Name,Description,UsageInstructions,Advantages,Presentation\nTape Pro,Wide dental tape,Daily,Flat,25m";
    expect(parseCatalogCsv(csv, "t").records[0].Name).toBe("Tape Pro");
  });

  it("rejects a dataset without the Advantages column", () => {
    const csv = "Description,UsageInstructions,Presentation\nFloss X: waxed,Use daily,30m roll";

    expect(() => parseCatalogCsv(csv, "t")).toThrow(LoadError);
    try {
      parseCatalogCsv(csv, "t");
    } catch (error) {
      expect(error).toBeInstanceOf(LoadError);
      if (error instanceof LoadError) {
        expect(error.code).toBe("load_error");
        expect(error.missingColumns).toEqual(["Advantages"]);
        expect(error.message).toBe("CSV is missing required columns: Advantages");
      }
    }
  });

  it("rejects a row with an empty required value", () => {
    const csv = `${CANONICAL_CSV}\nTape: flat,Daily,Flat,`;
    expect(() => parseCatalogCsv(csv, "t")).toThrow("Row 3 has no value for Presentation");
  });

  it("rejects empty input and header-only input", () => {
    expect(() => parseCatalogCsv("", "t")).toThrow("CSV is empty");
    expect(() => parseCatalogCsv("Description,UsageInstructions,Advantages,Presentation\n", "t")).toThrow(
      "CSV contains no products",
    );
  });

  it("returns frozen records", () => {
    const catalog = parseCatalogCsv(CANONICAL_CSV, "t");
    expect(Object.isFrozen(catalog.records)).toBe(true);
    expect(Object.isFrozen(catalog.records[0])).toBe(true);
  });
});

describe("deriveProductName()", () => {
  it("takes the text before the first colon", () => {
    expect(deriveProductName("Floss X: waxed: mint")).toBe("Floss X");
  });

  it("falls back to the whole description when there is no name part", () => {
    expect(deriveProductName("  plain description ")).toBe("plain description");
    expect(deriveProductName(": starts with colon")).toBe(": starts with colon");
  });
});

describe("resolveProduct()", () => {
  const first = record({ Name: "Floss X", Description: "Floss X: waxed", Advantages: "first" });
  const second = record({ Name: "Floss X", Description: "Floss X: unwaxed", Advantages: "second" });
  const brush = record({ Name: "Brush", Description: "Brush: soft" });
  const records = [first, second, brush];

  it("returns the first exact match in catalog order, every time", () => {
    expect(resolveProduct("Floss X", records)).toBe(first);
    expect(resolveProduct("Floss X", records)).toBe(first);
    expect(resolveProduct("  Brush ", records, "exact")).toBe(brush);
  });

  it("is case-sensitive in exact mode", () => {
    expect(resolveProduct("floss x", records, "exact")).toBeUndefined();
  });

  it("searches descriptions case-insensitively in substring mode", () => {
    expect(resolveProduct("UNWAXED", records, "substring")).toBe(second);
    expect(resolveProduct("floss", records, "substring")).toBe(first);
  });

  it("never matches a blank selection", () => {
    expect(resolveProduct("   ", records, "substring")).toBeUndefined();
    expect(resolveProduct("", records, "exact")).toBeUndefined();
  });

  it("returns undefined when nothing matches", () => {
    expect(resolveProduct("Mouthwash", records)).toBeUndefined();
  });
});

describe("CatalogStore", () => {
  it("keeps the previous catalog when a reload fails", () => {
    const store = new CatalogStore();
    store.loadCsv(CANONICAL_CSV, "good");

    expect(() => store.loadCsv("Description,UsageInstructions,Presentation\na,b,c", "bad")).toThrow(LoadError);
    expect(store.current?.source).toBe("good");
    expect(store.productNames()).toEqual(["Floss X", "Brush Soft"]);
  });

  it("has no products before a load", () => {
    const store = new CatalogStore();
    expect(store.current).toBeNull();
    expect(store.productNames()).toEqual([]);
    expect(store.resolve("Floss X", "exact")).toBeUndefined();
  });

  it("loads the bundled default dataset", async () => {
    const store = new CatalogStore();
    const catalog = await store.loadFile("Merged_Dental_Products.csv");

    expect(catalog.records).toHaveLength(3);
    expect(store.productNames()).toEqual(["Hilo Dental Menta", "Cepillo Suave Plus", "Enjuague Fresh"]);
  });
});

describe("loadCatalogFile()", () => {
  it("reports a missing file as a load error", async () => {
    await expect(loadCatalogFile("definitely-missing-catalog.csv")).rejects.toThrow(
      "Catalog file not found: definitely-missing-catalog.csv",
    );
  });
});
