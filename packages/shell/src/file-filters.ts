import type { FileFilter } from "@appshell/core";

import type { FeatureFlags } from "./config.js";

/** Extensions the built-in delimited-text importer accepts. */
export const TEXT_IMPORT_EXTENSIONS: readonly string[] = [".csv", ".txt", ".tsv"];

export const EXCEL_EXTENSIONS: readonly string[] = [".xlsx", ".xls", ".xlsm"];

/**
 * Filters for the "open data file" picker: one "Data Files" entry with
 * every importable extension (spreadsheets only when that feature is on),
 * then "All Files".
 */
export function buildOpenFileFilters(
  features: FeatureFlags,
  importExtensions: readonly string[] = TEXT_IMPORT_EXTENSIONS,
): FileFilter[] {
  const extensions = [...importExtensions];
  if (features.excelImport) extensions.push(...EXCEL_EXTENSIONS);
  return [
    { name: "Data Files", extensions },
    { name: "All Files", extensions: [".*"] },
  ];
}
