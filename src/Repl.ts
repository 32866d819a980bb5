import readline from "readline";
import type { MatchResults, PrefixMatchService } from "./PrefixMatchService.js";
import { errorMessage, log } from "./utils.js";

export const NO_MATCH = "<none>";

export type Output = { write(text: string): unknown };

export const helpText = [
  "Commands:",
  "  <string>        find the longest prefix of a single string",
  "  <s1>,<s2>,...   match several strings concurrently",
  "  help            show this message",
  "  exit            quit",
].join("\n");

export const formatMatch = (input: string, match: string | null) => `${input} → ${match ?? NO_MATCH}`;

/** Two column table of batch results, in the order the inputs were given */
export const formatResultsTable = (results: MatchResults) => {
  const rows = [...results].map(([input, match]) => [input, match ?? NO_MATCH] as const);
  const inputWidth = Math.max("Input".length, ...rows.map(([input]) => input.length));
  const matchWidth = Math.max("Match".length, ...rows.map(([, match]) => match.length));

  return [
    `${"Input".padEnd(inputWidth)} | Match`,
    "-".repeat(inputWidth + 3 + matchWidth),
    ...rows.map(([input, match]) => `${input.padEnd(inputWidth)} | ${match}`),
  ].join("\n");
};

/** Splits a comma separated batch command into the strings to match */
export const parseBatch = (line: string) =>
  line
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

/** Line based interactive front end for a prefix match service */
export class Repl {
  constructor(readonly service: PrefixMatchService, readonly output: Output) {}

  /**
   * Process one line of input. Returns false when the line asks to end the session.
   */
  async handleLine(raw: string) {
    const line = raw.trim();
    if (line.length == 0) return true;

    const command = line.toLowerCase();
    if (command == "exit" || command == "quit") return false;
    if (command == "help") {
      this.print(helpText);
      return true;
    }

    if (line.includes(",")) {
      const inputs = parseBatch(line);
      if (inputs.length == 0) {
        log.warn("No strings to match, separate them with commas like foo,bar");
        return true;
      }
      log.debug(`matching batch of ${inputs.length} strings`);
      this.print(formatResultsTable(await this.service.matchBatch(inputs)));
      return true;
    }

    this.print(formatMatch(line, this.service.matchSingle(line)));
    return true;
  }

  /** Read commands line by line until `exit` or the end of the input */
  async run(input: NodeJS.ReadableStream) {
    const reader = readline.createInterface({ input, terminal: false });
    try {
      for await (const line of reader) {
        let keepGoing: boolean;
        try {
          keepGoing = await this.handleLine(line);
        } catch (error) {
          log.error("Error matching input:", errorMessage(error));
          continue;
        }
        if (!keepGoing) break;
      }
    } finally {
      reader.close();
    }
  }

  private print(text: string) {
    this.output.write(text + "\n");
  }
}
