import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import type { ArtifactStorePort } from "../../core/ports/outboundPorts";

const extensionFor = (contentType: string): string => {
  const normalized = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  switch (normalized) {
    case "application/pdf":
      return ".pdf";
    case "image/png":
      return ".png";
    case "application/json":
      return ".json";
    case "text/plain":
      return ".txt";
    default:
      return ".bin";
  }
};

const safeSegment = (value: string): string =>
  value.replace(/[^A-Za-z0-9._-]/g, "_");

/**
 * Stores large artifacts on local disk and hands back file:// uris for the checkpoint to reference.
 * Writing the same (job, name) twice overwrites, so a re-run stage leaves one file.
 */
export class FileArtifactStore implements ArtifactStorePort {
  constructor(private readonly rootDir: string) {}

  async put(
    jobKey: string,
    name: string,
    bytes: Uint8Array,
    contentType: string,
  ): Promise<string> {
    const directory = path.resolve(this.rootDir, safeSegment(jobKey));
    await mkdir(directory, { recursive: true });

    const filePath = path.join(
      directory,
      `${safeSegment(name)}${extensionFor(contentType)}`,
    );
    await writeFile(filePath, bytes);
    return pathToFileURL(filePath).toString();
  }

  async get(uri: string): Promise<Uint8Array> {
    const buffer = await readFile(fileURLToPath(uri));
    return new Uint8Array(buffer);
  }
}
