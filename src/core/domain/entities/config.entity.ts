export interface ApiConfig {
  /** Clash control API log stream, e.g. http://127.0.0.1:9090/logs?level=debug */
  url: string;
  probeTimeoutMs: number;
  pollTimeoutMs: number;
}

export interface ServiceConfig {
  /** Executable followed by its arguments. */
  restartCommand: string[];
  settleMs: number;
  readyTimeoutMs: number;
  pollIntervalMs: number;
}

export interface CaptureConfig {
  durationMs: number;
  debugMarker: string;
}

export interface PathsConfig {
  scratchDir: string;
  fullApiLog: string;
  debugApiLog: string;
  /** Fixed by the vendor debug script; only change it together with the script. */
  systemDebugLog: string;
  archiveDir: string;
  archivePrefix: string;
}

export interface VendorConfig {
  debugScript: string;
}

export interface LoggingConfig {
  /** Empty string disables the JSON-lines mirror. */
  jsonLogPath: string;
}

export interface Config {
  api: ApiConfig;
  service: ServiceConfig;
  capture: CaptureConfig;
  paths: PathsConfig;
  vendor: VendorConfig;
  logging: LoggingConfig;
}
