import { describe, expect, it } from "vitest";
import {
  NoModelConfiguredError,
  NoProfileConfiguredError,
  ParleyError,
  StreamError,
  TransportError,
  describeExchangeFailure,
  errorMessage,
  toStreamError,
  toTransportError,
} from "./errors.js";

describe("describeExchangeFailure", () => {
  it("includes status and body for http failures", () => {
    const error = new TransportError("401 unauthorized", { status: 401, body: " invalid key \n" });
    expect(describeExchangeFailure(error)).toBe("request failed: status 401 - invalid key");
  });

  it("falls back to the message when the body is blank", () => {
    const error = new TransportError("502 bad gateway", { status: 502, body: "  " });
    expect(describeExchangeFailure(error)).toBe("request failed: status 502 - 502 bad gateway");
  });

  it("uses the message alone without a status", () => {
    expect(describeExchangeFailure(new TransportError("getaddrinfo ENOTFOUND"))).toBe(
      "request failed: getaddrinfo ENOTFOUND",
    );
    expect(describeExchangeFailure(new StreamError("socket hang up"))).toBe("stream failed: socket hang up");
  });
});

describe("error conversion", () => {
  it("keeps status and body when a transport error surfaces during a stream", () => {
    const original = new TransportError("429 slow down", { status: 429, body: "rate limited" });
    const converted = toStreamError(original);

    expect(converted).toBeInstanceOf(StreamError);
    expect(converted.code).toBe("stream_error");
    expect(converted.status).toBe(429);
    expect(converted.body).toBe("rate limited");
    expect(converted.cause).toBe(original);
  });

  it("wraps unknown values", () => {
    const converted = toTransportError("plain failure");
    expect(converted).toBeInstanceOf(TransportError);
    expect(converted.message).toBe("plain failure");
    expect(converted.status).toBeUndefined();
  });

  it("returns transport errors unchanged", () => {
    const error = new TransportError("boom");
    expect(toTransportError(error)).toBe(error);
  });
});

describe("configuration errors", () => {
  it("carry machine-readable codes", () => {
    const noProfile = new NoProfileConfiguredError();
    const noModel = new NoModelConfiguredError("p1");

    expect(noProfile).toBeInstanceOf(ParleyError);
    expect(noProfile.code).toBe("no_profile_configured");
    expect(noProfile.message).toBe("no api profile configured");
    expect(noModel.code).toBe("no_model_configured");
    expect(noModel.message).toBe("api profile p1 lists no models");
  });
});

describe("errorMessage", () => {
  it("prefers the message and falls back to the name", () => {
    expect(errorMessage(new Error("bad"))).toBe("bad");
    expect(errorMessage(new TypeError())).toBe("TypeError");
    expect(errorMessage(42)).toBe("42");
  });
});
