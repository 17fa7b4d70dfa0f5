import { mkdir, writeFile } from "fs/promises";
import { join } from "path";

/** Filesystem-safe UTC timestamp, e.g. 2024-05-01T12-30-05-123Z. */
export function fileTimestamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, "-");
}

/**
 * Writes screenshots and recordings under one directory with timestamped
 * names. The directory is created on first use.
 */
export class ArtifactStore {
  readonly dir: string;
  private readonly now: () => Date;

  constructor(dir: string, now: () => Date = () => new Date()) {
    this.dir = dir;
    this.now = now;
  }

  async save(prefix: string, extension: string, data: Buffer): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const filePath = join(this.dir, `${prefix}-${fileTimestamp(this.now())}.${extension}`);
    await writeFile(filePath, data);
    return filePath;
  }
}
