import path from "node:path";
import dotenv from "dotenv";

const rootDir = process.cwd();
const configEnvPath = path.join(rootDir, "config.env");

// Variables already present in the environment win over config.env.
dotenv.config({
  path: configEnvPath
});

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const readOptionalPath = (value: string | undefined): string | null => {
  const raw = (value ?? "").trim();
  if (!raw) return null;
  return path.isAbsolute(raw) ? raw : path.join(rootDir, raw);
};

const resolveDatabaseFile = (value: string | undefined): string => {
  const raw = (value ?? "").trim();
  if (raw === ":memory:") return raw;
  return readOptionalPath(raw) ?? path.join(rootDir, "data", "wiki.sqlite");
};

export const config = {
  rootDir,
  port: parsePositiveInt(process.env.PORT, 8080),
  host: process.env.HOST ?? "0.0.0.0",
  isProduction: process.env.NODE_ENV === "production",
  logLevel: process.env.LOG_LEVEL ?? "info",
  wikiTitle: process.env.WIKI_TITLE ?? "Wiki",
  databaseFile: resolveDatabaseFile(process.env.WIKI_DB_FILE),
  queriesFile: readOptionalPath(process.env.WIKI_DB_QUERIES_FILE),
  publicDir: path.join(rootDir, "public")
};
