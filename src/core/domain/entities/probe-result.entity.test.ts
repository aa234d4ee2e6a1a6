import { describe, it, expect } from "vitest";
import { classifyProbe } from "./probe-result.entity.js";

describe("classifyProbe", () => {
  it("treats HTTP 401 as an authentication failure", () => {
    expect(
      classifyProbe({ httpStatus: 401, bodyContainsUnauthorizedMarker: false }),
    ).toBe("AuthFailed");
  });

  it("treats the unauthorized body as an authentication failure even with 200", () => {
    expect(
      classifyProbe({ httpStatus: 200, bodyContainsUnauthorizedMarker: true }),
    ).toBe("AuthFailed");
  });

  it("lets the unauthorized body win over other error statuses", () => {
    expect(
      classifyProbe({ httpStatus: 503, bodyContainsUnauthorizedMarker: true }),
    ).toBe("AuthFailed");
  });

  it.each([0, 204, 302, 403, 404, 500, 503])(
    "treats status %i as a connectivity failure",
    (status) => {
      expect(
        classifyProbe({ httpStatus: status, bodyContainsUnauthorizedMarker: false }),
      ).toBe("ConnectFailed");
    },
  );

  it("accepts exactly 200 without the marker", () => {
    expect(
      classifyProbe({ httpStatus: 200, bodyContainsUnauthorizedMarker: false }),
    ).toBe("Ok");
  });
});
