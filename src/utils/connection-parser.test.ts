import assert from "node:assert/strict";
import test from "node:test";
import { AddressParseErrorCode, parseAddress } from "./connection-parser";

test("parseAddress defaults the port to 22", () => {
  assert.deepEqual(parseAddress("10.0.0.5"), { success: true, data: { host: "10.0.0.5", port: 22 } });
  assert.deepEqual(parseAddress("node-1.internal"), { success: true, data: { host: "node-1.internal", port: 22 } });
});

test("parseAddress reads an explicit port", () => {
  assert.deepEqual(parseAddress("10.0.0.5:2222"), { success: true, data: { host: "10.0.0.5", port: 2222 } });
});

test("parseAddress handles IPv6 forms", () => {
  assert.deepEqual(parseAddress("[::1]:2200"), { success: true, data: { host: "::1", port: 2200 } });
  assert.deepEqual(parseAddress("[fe80::1]"), { success: true, data: { host: "fe80::1", port: 22 } });
  assert.deepEqual(parseAddress("fe80::1"), { success: true, data: { host: "fe80::1", port: 22 } });
});

function errorCode(address: string): AddressParseErrorCode | null {
  const result = parseAddress(address);
  return result.success ? null : result.error.code;
}

test("parseAddress rejects malformed addresses", () => {
  assert.equal(errorCode(""), AddressParseErrorCode.EMPTY);
  assert.equal(errorCode("   "), AddressParseErrorCode.EMPTY);
  assert.equal(errorCode("host:0"), AddressParseErrorCode.INVALID_PORT);
  assert.equal(errorCode("host:abc"), AddressParseErrorCode.INVALID_PORT);
  assert.equal(errorCode("host:70000"), AddressParseErrorCode.INVALID_PORT);
  assert.equal(errorCode("bad host:22"), AddressParseErrorCode.INVALID_HOST);
});
