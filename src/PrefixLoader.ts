import fs from "fs-extra";
import { ConfigurationError } from "./errors.js";
import { errorMessage, log } from "./utils.js";

/** Split prefix file contents into prefixes, one per line, ignoring blank lines and surrounding whitespace */
export const parsePrefixes = (contents: string) =>
  contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

/**
 * Read a plain text prefix list into memory
 */
export const loadPrefixes = async (file: string) => {
  let contents: string;
  try {
    contents = await fs.readFile(file, "utf-8");
  } catch (error) {
    throw new ConfigurationError(`Failed to load prefixes from file ${file}: ${errorMessage(error)}`, { cause: error });
  }

  const prefixes = parsePrefixes(contents);
  log.debug(`Loaded ${prefixes.length} prefixes from ${file}`);
  return prefixes;
};
