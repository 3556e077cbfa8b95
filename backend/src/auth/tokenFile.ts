import { randomBytes } from "node:crypto";
import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { PersistError } from "./errors.js";

/**
 * Overwrites `path` with the raw access token (no newline, no JSON).
 *
 * Writes to a sibling temp file first and renames it into place, so a reader
 * sees either the previous token or the new one.
 */
export async function persistToken(accessToken: string, path: string): Promise<void> {
  const tmp = `${path}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(tmp, accessToken, { encoding: "utf8", mode: 0o644 });
    await rename(tmp, path);
  } catch (err) {
    await unlink(tmp).catch(() => undefined); // pode nem ter sido criado
    throw new PersistError(path, err);
  }
}

// Lê o token publicado; null quando o arquivo ainda não existe.
export async function readToken(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}
