import { describe, it, expect, beforeEach, afterEach } from "vitest";
import {
  existsSync,
  mkdtempSync,
  readdirSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PackageLogsUseCase, archiveFileName } from "./package-logs.use-case.js";
import { TarArchiveService } from "../../infrastructure/services/tar-archive.service.js";
import { IArchiveService } from "../domain/services/archive.service.js";
import { RecordingLogger } from "../../test-utils/fakes.js";
import { listTarGz } from "../../test-utils/tar.js";

const STARTED_AT = new Date(2026, 0, 5, 7, 8, 9);

describe("archiveFileName", () => {
  it("embeds the start time", () => {
    expect(archiveFileName("openclash_debug_package", STARTED_AT)).toBe(
      "openclash_debug_package_20260105_070809.tar.gz",
    );
  });
});

describe("PackageLogsUseCase", () => {
  let dir: string;
  let files: string[];
  let logger: RecordingLogger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "package-logs-"));
    files = [
      join(dir, "openclash_full_api.log"),
      join(dir, "openclash_debug_api.log"),
      join(dir, "openclash_debug.log"),
    ];
    logger = new RecordingLogger();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function request() {
    return { files, archiveDir: dir, archivePrefix: "openclash_debug_package", startedAt: STARTED_AT };
  }

  it("archives exactly the three files by base name, even when empty", async () => {
    writeFileSync(files[0], "");
    writeFileSync(files[1], "");
    writeFileSync(files[2], "system report\n");
    const useCase = new PackageLogsUseCase(new TarArchiveService(), logger);

    const result = await useCase.execute(request());

    const expectedPath = join(dir, "openclash_debug_package_20260105_070809.tar.gz");
    expect(result).toEqual({ status: "created", archivePath: expectedPath, cleanedUp: true });
    expect(statSync(expectedPath).size).toBeGreaterThan(0);
    expect(listTarGz(expectedPath)).toEqual([
      { name: "openclash_full_api.log", size: 0 },
      { name: "openclash_debug_api.log", size: 0 },
      { name: "openclash_debug.log", size: 14 },
    ]);
  });

  it("removes the temporary logs after archiving", async () => {
    for (const f of files) writeFileSync(f, "x");
    const useCase = new PackageLogsUseCase(new TarArchiveService(), logger);

    await useCase.execute(request());

    expect(readdirSync(dir)).toEqual(["openclash_debug_package_20260105_070809.tar.gz"]);
  });

  it("refuses to archive when a file is missing", async () => {
    writeFileSync(files[0], "");
    writeFileSync(files[1], "");
    const useCase = new PackageLogsUseCase(new TarArchiveService(), logger);

    const result = await useCase.execute(request());

    expect(result.status).toBe("incomplete");
    expect(result.archivePath).toBeUndefined();
    expect(result.error?.kind).toBe("ArchiveIncomplete");
    expect(readdirSync(dir)).toEqual([]);
  });

  it("keeps the logs and any partial archive when compression fails", async () => {
    for (const f of files) writeFileSync(f, "x");
    const failing: IArchiveService = {
      async createArchive(destination) {
        writeFileSync(destination, "partial");
        throw new Error("disk full");
      },
    };
    const useCase = new PackageLogsUseCase(failing, logger);

    const result = await useCase.execute(request());

    expect(result.status).toBe("failed");
    expect(result.cleanedUp).toBe(false);
    expect(result.error?.kind).toBe("ArchiveCreationFailure");
    for (const f of files) expect(existsSync(f)).toBe(true);
    expect(existsSync(join(dir, "openclash_debug_package_20260105_070809.tar.gz"))).toBe(true);
  });
});
