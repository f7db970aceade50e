import fs from "node:fs/promises";

export interface PageQueries {
  createPagesTable: string;
  allPages: string;
  getPage: string;
  createPage: string;
  savePage: string;
  deletePage: string;
}

export const DEFAULT_PAGE_QUERIES: Readonly<PageQueries> = {
  createPagesTable:
    "CREATE TABLE IF NOT EXISTS Pages (Id INTEGER PRIMARY KEY AUTOINCREMENT, Name VARCHAR(255) UNIQUE, Content TEXT)",
  allPages: "SELECT Name FROM Pages",
  getPage: "SELECT Id, Name, Content FROM Pages WHERE Name = ?",
  createPage: "INSERT INTO Pages (Name, Content) VALUES (?, ?)",
  savePage: "UPDATE Pages SET Content = ? WHERE Id = ?",
  deletePage: "DELETE FROM Pages WHERE Id = ?"
};

const QUERY_KEYS: ReadonlyArray<keyof PageQueries> = [
  "createPagesTable",
  "allPages",
  "getPage",
  "createPage",
  "savePage",
  "deletePage"
];

/**
 * Merges statement overrides over the defaults. Unknown keys and blank or
 * non-string values are ignored.
 */
export const mergePageQueries = (overrides: unknown): PageQueries => {
  const merged: PageQueries = { ...DEFAULT_PAGE_QUERIES };
  if (!overrides || typeof overrides !== "object" || Array.isArray(overrides)) {
    return merged;
  }

  const source = new Map(Object.entries(overrides));
  for (const key of QUERY_KEYS) {
    const value = source.get(key);
    if (typeof value === "string" && value.trim().length > 0) {
      merged[key] = value.trim();
    }
  }

  return merged;
};

/**
 * Reads SQL overrides from a JSON file. Without a path the defaults are
 * returned; a configured path that cannot be read or parsed is an error.
 */
export const loadPageQueries = async (filePath?: string | null): Promise<PageQueries> => {
  if (!filePath) return { ...DEFAULT_PAGE_QUERIES };

  const raw = await fs.readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return mergePageQueries(parsed);
};
