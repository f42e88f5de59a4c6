import { readFile, writeFile } from "node:fs/promises";
import { err, type Calendar, type Result } from "@tzcal/core";
import { IcsError } from "./errors.js";
import { fromIcsString, type IcsReadOptions } from "./reader.js";
import { toIcsString } from "./writer.js";

export async function exportToIcs(calendar: Calendar, filePath: string): Promise<void> {
  await writeFile(filePath, toIcsString(calendar), "utf-8");
}

export async function importFromIcs(
  filePath: string,
  options: IcsReadOptions = {},
): Promise<Result<Calendar, IcsError>> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    return err(
      new IcsError(
        `Could not read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      ),
    );
  }
  return fromIcsString(text, options);
}
