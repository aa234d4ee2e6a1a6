import { readFile, stat, writeFile } from "node:fs/promises";
import { ILogger } from "../domain/services/logger.service.js";
import { CollectorError } from "../domain/entities/collector-error.entity.js";

export interface SplitDebugLogsRequest {
  source: string;
  destination: string;
  marker: string;
}

export interface SplitDebugLogsResult {
  status: "filtered" | "empty";
  matched: number;
  error?: CollectorError;
}

/**
 * Lines containing `marker`, in order, each terminated by "\n". Content is
 * handled as latin1 so every byte round-trips unchanged.
 */
export function selectMatchingLines(content: string, marker: string): string[] {
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.filter((line) => line.includes(marker));
}

async function sizeOf(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}

export class SplitDebugLogsUseCase {
  constructor(private logger: ILogger) {}

  async execute(request: SplitDebugLogsRequest): Promise<SplitDebugLogsResult> {
    this.logger.info("Filtering API logs...");

    if ((await sizeOf(request.source)) === 0) {
      const error = new CollectorError(
        "CaptureEmpty",
        "Full API log file is empty or not found. Cannot create filtered log.",
      );
      this.logger.error(error.message);
      await writeFile(request.destination, "");
      return { status: "empty", matched: 0, error };
    }

    const content = await readFile(request.source, "latin1");
    const matches = selectMatchingLines(content, request.marker);
    const output = matches.map((line) => line + "\n").join("");
    await writeFile(request.destination, output, "latin1");

    this.logger.info(`Created filtered debug API log (${matches.length} lines).`);
    return { status: "filtered", matched: matches.length };
  }
}
