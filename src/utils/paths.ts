import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { log } from "./logger.js";

const APP_DIR_NAME = "canvas-outcome-reporter";

// Resolves to the package root from both src/utils and dist/utils
const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

export const BUNDLED_TEMPLATE_DIR = path.join(projectRoot, "templates");

/**
 * Platform-specific per-user data directory.
 */
export function defaultDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (platform === "darwin") {
    return path.join(os.homedir(), "Library", "Application Support", APP_DIR_NAME);
  }
  if (platform === "win32") {
    const appData = env.APPDATA ?? path.join(os.homedir(), "AppData", "Roaming");
    return path.join(appData, APP_DIR_NAME);
  }
  return path.join(os.homedir(), ".config", APP_DIR_NAME);
}

export function expandTilde(filePath: string): string {
  if (filePath === "~" || filePath.startsWith("~/") || filePath.startsWith("~\\")) {
    return path.join(os.homedir(), filePath.slice(1));
  }
  return filePath;
}

/**
 * Ensure the user template directory exists. When it holds no templates yet,
 * copy in the ones bundled with the package.
 *
 * @returns Number of templates copied
 */
export async function seedTemplateDir(
  templateDir: string,
  bundledDir: string = BUNDLED_TEMPLATE_DIR,
): Promise<number> {
  await fs.mkdir(templateDir, { recursive: true });

  const existing = (await fs.readdir(templateDir)).filter((f) => f.endsWith(".json"));
  if (existing.length > 0) return 0;

  let bundled: string[];
  try {
    bundled = (await fs.readdir(bundledDir)).filter((f) => f.endsWith(".json"));
  } catch {
    log("DEBUG", `No bundled templates at ${bundledDir}`);
    return 0;
  }

  for (const file of bundled) {
    await fs.copyFile(path.join(bundledDir, file), path.join(templateDir, file));
  }
  if (bundled.length > 0) {
    log("INFO", `Seeded ${bundled.length} template(s) into ${templateDir}`);
  }
  return bundled.length;
}
