import * as fs from "fs";
import { parseDialogue, type LoadedDialogue, type ParseDialogueOptions } from "./dsl.js";

/** Read a UTF-8 dialogue script from disk and parse it. */
export function loadDialogueFile(path: string, options: ParseDialogueOptions = {}): LoadedDialogue {
  return parseDialogue(fs.readFileSync(path, "utf8"), options);
}
