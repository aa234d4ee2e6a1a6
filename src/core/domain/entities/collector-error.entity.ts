export type CollectorErrorKind =
  | "AuthenticationError"
  | "ConnectivityError"
  | "AvailabilityTimeout"
  | "CaptureEmpty"
  | "ExternalScriptOutputMissing"
  | "ArchiveIncomplete"
  | "ArchiveCreationFailure";

export class CollectorError extends Error {
  constructor(
    public readonly kind: CollectorErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CollectorError";
  }

  get fatal(): boolean {
    return (
      this.kind === "AuthenticationError" || this.kind === "ConnectivityError"
    );
  }
}
