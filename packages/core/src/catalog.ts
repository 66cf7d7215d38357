/**
 * catalog.ts — scored image catalog reader
 *
 * The catalog is a delimited text file written by the darkness scoring
 * pipeline: one header line, then `<path><delim><score>` rows. Extra fields
 * past the score are ignored. Rows that cannot be used are dropped without
 * failing the load.
 */

import { readFileSync } from "fs";
import type { ScoredImage } from "./domain.js";
import { err, errorCode, errorMessage, ok } from "./errors.js";
import type { CatalogUnreadable, Result } from "./errors.js";

export const DEFAULT_CATALOG_DELIMITER = ",";

export interface CatalogParseOptions {
  delimiter?: string;
}

/**
 * Leading numeric prefix, surrounding whitespace allowed. "abc", "" and
 * values that overflow to Infinity are rejected.
 */
export function parseScore(field: string): number | undefined {
  const parsed = Number.parseFloat(field.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCatalogRow(line: string, delimiter: string): ScoredImage | undefined {
  const fields = line.split(delimiter);
  if (fields.length < 2) return undefined;

  const path = fields[0] ?? "";
  if (path.length === 0) return undefined;

  const score = parseScore(fields[1] ?? "");
  if (score === undefined) return undefined;

  return { path, score };
}

export function parseCatalog(content: string, options: CatalogParseOptions = {}): ScoredImage[] {
  const delimiter = options.delimiter ?? DEFAULT_CATALOG_DELIMITER;
  const lines = content.split(/\r?\n/);
  const images: ScoredImage[] = [];

  // Header is discarded without looking at it.
  for (const line of lines.slice(1)) {
    const image = parseCatalogRow(line, delimiter);
    if (image) images.push(image);
  }

  return images;
}

export function loadCatalog(
  filePath: string,
  options: CatalogParseOptions = {},
): Result<ScoredImage[], CatalogUnreadable> {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error: unknown) {
    return err({
      kind: "catalog-unreadable",
      path: filePath,
      reason: errorCode(error) ?? errorMessage(error),
    });
  }
  return ok(parseCatalog(content, options));
}
