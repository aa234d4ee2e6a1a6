export const UNAUTHORIZED_MARKER = '{"message":"Unauthorized"}';

/** Status 0 means no HTTP response was received at all. */
export interface ProbeResult {
  httpStatus: number;
  bodyContainsUnauthorizedMarker: boolean;
}

export type ProbeOutcome = "AuthFailed" | "ConnectFailed" | "Ok";

/**
 * The API may answer 200 with an error payload instead of a proper 401,
 * so the body marker is checked independently of the status.
 */
export function classifyProbe(result: ProbeResult): ProbeOutcome {
  if (result.httpStatus === 401 || result.bodyContainsUnauthorizedMarker) {
    return "AuthFailed";
  }
  if (result.httpStatus !== 200) return "ConnectFailed";
  return "Ok";
}
