import test from "node:test";
import assert from "node:assert/strict";
import {
  asMessage,
  classifyHttpStatus,
  ConfigurationError,
  resolveErrorCode,
  TransportFailure,
} from "../../../runtime/llm/errors";

test("classifyHttpStatus: auth, rate-limit and other statuses map to distinct codes", () => {
  assert.equal(classifyHttpStatus(401), "POE_PERMANENT_HTTP_401");
  assert.equal(classifyHttpStatus(403), "POE_PERMANENT_HTTP_403");
  assert.equal(classifyHttpStatus(429), "POE_TRANSIENT_HTTP_429");
  assert.equal(classifyHttpStatus(503), "POE_TRANSIENT_HTTP_503");
  assert.equal(classifyHttpStatus(400), "POE_HTTP_400");
});

test("resolveErrorCode: transport failures keep their code, anything else is a request failure", () => {
  assert.equal(resolveErrorCode(new TransportFailure("POE_BAD_RESPONSE", "not JSON")), "POE_BAD_RESPONSE");
  assert.equal(resolveErrorCode(new TypeError("fetch failed")), "POE_REQUEST_FAILED");
  assert.equal(resolveErrorCode("boom"), "POE_REQUEST_FAILED");
});

test("error messages: TransportFailure prefixes its code, ConfigurationError keeps its kind", () => {
  assert.equal(asMessage(new TransportFailure("POE_HTTP_500", "request failed")), "POE_HTTP_500: request failed");
  assert.equal(asMessage(42), "42");
  const error = new ConfigurationError("CONFIGURATION_ERROR POE_API_KEY is not set");
  assert.equal(error.kind, "CONFIGURATION_ERROR");
  assert.equal(error.name, "ConfigurationError");
});
