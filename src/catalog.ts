import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { LoadError } from "./errors";
import type { MatchMode } from "./validators";

export const REQUIRED_FIELDS = ["Description", "UsageInstructions", "Advantages", "Presentation"] as const;

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export interface ProductRecord {
  readonly Name: string;
  readonly Description: string;
  readonly UsageInstructions: string;
  readonly Advantages: string;
  readonly Presentation: string;
  readonly [field: string]: string;
}

export interface Catalog {
  readonly source: string;
  readonly loadedAt: string;
  readonly records: readonly ProductRecord[];
}

const COLUMN_ALIASES: Record<RequiredField | "Name", string[]> = {
  Name: ["Name", "Nombre"],
  Description: ["Description", "Descripción"],
  UsageInstructions: ["UsageInstructions", "Instrucciones de Uso"],
  Advantages: ["Advantages", "Ventajas"],
  Presentation: ["Presentation", "Presentación"],
};

const csvRowsSchema = z.array(z.array(z.string()));

function normalizeHeader(header: string): string {
  return header.normalize("NFC").trim();
}

function canonicalColumn(header: string): string {
  const normalized = normalizeHeader(header);
  for (const [field, aliases] of Object.entries(COLUMN_ALIASES)) {
    if (aliases.some((alias) => alias.toLowerCase() === normalized.toLowerCase())) {
      return field;
    }
  }
  return normalized;
}

/** "Floss X: waxed floss..." -> "Floss X" */
export function deriveProductName(description: string): string {
  const head = description.split(":")[0].trim();
  return head.length > 0 ? head : description.trim();
}

function readRows(text: string): string[][] {
  let raw: unknown;
  try {
    raw = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (error) {
    throw new LoadError(`CSV could not be parsed: ${error instanceof Error ? error.message : String(error)}`);
  }

  const rows = csvRowsSchema.safeParse(raw);
  if (!rows.success) {
    throw new LoadError("CSV could not be parsed: unexpected row shape");
  }
  return rows.data;
}

/**
 * Parses a product CSV into a catalog. Throws LoadError on any missing
 * required column or value; a catalog is only returned when every row is valid.
 */
export function parseCatalogCsv(text: string, source: string): Catalog {
  const [header, ...body] = readRows(text);
  if (!header) {
    throw new LoadError("CSV is empty", [...REQUIRED_FIELDS]);
  }

  const columns = header.map(canonicalColumn);
  const missing = REQUIRED_FIELDS.filter((field) => !columns.includes(field));
  if (missing.length > 0) {
    throw new LoadError(`CSV is missing required columns: ${missing.join(", ")}`, missing);
  }

  if (body.length === 0) {
    throw new LoadError("CSV contains no products");
  }

  const records = body.map((cells, index) => {
    const fields: Record<string, string> = {};
    columns.forEach((column, position) => {
      fields[column] = (cells[position] ?? "").trim();
    });

    for (const field of REQUIRED_FIELDS) {
      if (!fields[field]) {
        throw new LoadError(`Row ${index + 1} has no value for ${field}`);
      }
    }

    const record: ProductRecord = {
      ...fields,
      Name: fields.Name || deriveProductName(fields.Description),
      Description: fields.Description,
      UsageInstructions: fields.UsageInstructions,
      Advantages: fields.Advantages,
      Presentation: fields.Presentation,
    };
    return Object.freeze(record);
  });

  return Object.freeze({
    source,
    loadedAt: new Date().toISOString(),
    records: Object.freeze(records),
  });
}

export async function loadCatalogFile(filePath: string): Promise<Catalog> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? String(error.code) : "";
    throw new LoadError(
      code === "ENOENT"
        ? `Catalog file not found: ${filePath}`
        : `Catalog file could not be read: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return parseCatalogCsv(text, filePath);
}

/**
 * First record in catalog order matching the selection.
 * exact: trimmed selection equals Name. substring: case-insensitive search in Description.
 */
export function resolveProduct(
  selection: string,
  records: readonly ProductRecord[],
  mode: MatchMode = "exact",
): ProductRecord | undefined {
  const wanted = selection.trim();
  if (!wanted) return undefined;

  if (mode === "exact") {
    return records.find((record) => record.Name === wanted);
  }

  const needle = wanted.toLowerCase();
  return records.find((record) => record.Description.toLowerCase().includes(needle));
}

/** Holds the active catalog; a failed reload keeps the previous one. */
export class CatalogStore {
  private catalog: Catalog | null = null;

  get current(): Catalog | null {
    return this.catalog;
  }

  replace(next: Catalog): void {
    this.catalog = next;
  }

  async loadFile(filePath: string): Promise<Catalog> {
    const next = await loadCatalogFile(filePath);
    this.replace(next);
    return next;
  }

  loadCsv(text: string, source: string): Catalog {
    const next = parseCatalogCsv(text, source);
    this.replace(next);
    return next;
  }

  productNames(): string[] {
    return this.catalog ? this.catalog.records.map((record) => record.Name) : [];
  }

  resolve(selection: string, mode: MatchMode): ProductRecord | undefined {
    return this.catalog ? resolveProduct(selection, this.catalog.records, mode) : undefined;
  }
}
