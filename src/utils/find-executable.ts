import { access } from "fs/promises";
import { constants } from "node:fs";
import path from "node:path";

/**
 * Resolve an executable name against PATH
 * Returns the absolute path of the first match, or null
 */
export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<string | null> {
  // Explicit paths are checked as-is
  if (name.includes("/") || name.includes(path.sep)) {
    return (await isExecutable(name)) ? path.resolve(name) : null;
  }

  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  const extensions =
    process.platform === "win32"
      ? (env.PATHEXT ?? ".EXE;.CMD;.BAT;.COM").split(";")
      : [""];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, name + ext);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }

  return null;
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    await access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
