/**
 * Output sink for generated source
 *
 * A file is opened once per run and closed on every exit path; without a
 * file the source goes to standard output.
 */

import { closeSync, mkdirSync, openSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import type { TextSink } from "@genapi/emitter";

export type OutputSink = TextSink & {
  /** Where the text goes, for messages */
  readonly description: string;
};

const stdoutSink: OutputSink = {
  description: "standard output",
  write: (text) => {
    process.stdout.write(text);
  },
};

/**
 * Run `body` with a sink for `output` (a file path, or standard output when
 * undefined), releasing the file afterwards.
 */
export const withOutput = <T>(
  output: string | undefined,
  body: (sink: OutputSink) => T
): T => {
  if (output === undefined) {
    return body(stdoutSink);
  }

  mkdirSync(dirname(output), { recursive: true });
  const fd = openSync(output, "w");
  try {
    return body({
      description: output,
      write: (text) => {
        writeSync(fd, text, null, "utf-8");
      },
    });
  } finally {
    closeSync(fd);
  }
};
