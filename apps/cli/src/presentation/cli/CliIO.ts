import { createInterface } from "readline";

export interface PastedPassage {
  citation: string;
  text: string;
}

/**
 * Terminal side effects of the CLI, behind an interface so commands can be
 * driven from tests.
 */
export interface CliIO {
  /** Write to stdout; studies and listings go here */
  out(text: string): void;
  /** Write to stderr; progress, warnings and errors go here */
  err(text: string): void;
  /**
   * Read a citation (unless given) and passage text from stdin. From a
   * terminal the text ends at the first blank line after some content;
   * from a pipe it runs to end of input.
   */
  readPaste(citation?: string): Promise<PastedPassage>;
  setExitCode(code: number): void;
}

export const processIO: CliIO = {
  out: (text) => {
    process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
  },
  err: (text) => {
    process.stderr.write(text.endsWith("\n") ? text : `${text}\n`);
  },
  readPaste: async (citation) => {
    const interactive = process.stdin.isTTY === true;
    const rl = createInterface({ input: process.stdin, terminal: false });
    const lines = rl[Symbol.asyncIterator]();

    try {
      let reference = citation;
      if (reference === undefined) {
        process.stderr.write("Biblical reference (e.g. John 3:16-21): ");
        const first = await lines.next();
        reference = first.done ? "" : first.value;
      }

      if (interactive) {
        process.stderr.write(
          "Paste the passage text. Finish with an empty line or Ctrl-D.\n",
        );
      }

      const text: string[] = [];
      for (let next = await lines.next(); !next.done; next = await lines.next()) {
        if (interactive && next.value.trim() === "" && text.length > 0) {
          break;
        }
        text.push(next.value);
      }

      return { citation: reference.trim(), text: text.join("\n") };
    } finally {
      rl.close();
    }
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};
