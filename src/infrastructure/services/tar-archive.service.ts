import { createWriteStream } from "node:fs";
import { basename } from "node:path";
import archiver from "archiver";
import { IArchiveService } from "../../core/domain/services/archive.service.js";

/** gzip-compressed tar, entries flattened to their base names. */
export class TarArchiveService implements IArchiveService {
  constructor(private level = 9) {}

  createArchive(destination: string, files: string[]): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const output = createWriteStream(destination);
      const archive = archiver("tar", {
        gzip: true,
        gzipOptions: { level: this.level },
      });

      output.on("close", () => resolve());
      output.on("error", reject);
      archive.on("error", reject);
      archive.on("warning", reject);

      archive.pipe(output);
      for (const file of files) {
        archive.file(file, { name: basename(file) });
      }
      archive.finalize().catch(reject);
    });
  }
}
