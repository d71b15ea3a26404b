import { describe, it, expect } from "vitest";
import { rawToString } from "../ws-server.js";

describe("rawToString", () => {
  it("decodes a buffer", () => {
    expect(rawToString(Buffer.from('{"a":1}'))).toBe('{"a":1}');
  });

  it("joins fragmented buffers", () => {
    expect(rawToString([Buffer.from('{"jsonrpc":'), Buffer.from('"2.0"}')])).toBe('{"jsonrpc":"2.0"}');
  });

  it("decodes an array buffer", () => {
    const bytes = new TextEncoder().encode("ping");
    const copy = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(copy).set(bytes);
    expect(rawToString(copy)).toBe("ping");
  });
});
