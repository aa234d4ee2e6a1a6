import { CollectorError } from "./collector-error.entity.js";

export type CollectionStatus = "auth_failed" | "connect_failed" | "completed";

export interface CollectionReport {
  status: CollectionStatus;
  exitCode: 0 | 1;
  /** True when the API never came back and an empty capture was written instead. */
  captureSkipped: boolean;
  /** Absolute path, set only when the archive was written successfully. */
  archivePath?: string;
  /** Non-fatal problems in the order they were detected, plus the fatal one if any. */
  errors: CollectorError[];
}
