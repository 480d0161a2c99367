import { stat } from "fs/promises";

/**
 * True when the path exists and is a regular file
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.isFile();
  } catch {
    return false;
  }
}
