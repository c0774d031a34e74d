import { readFileSync } from "fs";
import path from "path";
import { ScriptFileError } from "../errors";

export function loadScript(scriptPath: string, cwd = process.cwd()) {
  const resolved = path.resolve(cwd, scriptPath);
  try {
    return readFileSync(resolved, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ScriptFileError(resolved, reason);
  }
}
