import { describe, expect, it } from "vitest";
import { decodeNpy, encodeNpy, NpyFormatError } from "../src/npy";

describe("npy codec", () => {
  const matrix = { rows: 2, cols: 3, data: Float32Array.from([1, 2, 3, 0.5, -0.25, 0]) };

  it("writes a version 1.0 header aligned to 64 bytes", () => {
    const buf = encodeNpy(matrix);
    expect(buf.subarray(0, 6).toString("latin1")).toBe("\x93NUMPY");
    expect([buf[6], buf[7]]).toEqual([1, 0]);
    const headerLen = buf.readUInt16LE(8);
    expect((10 + headerLen) % 64).toBe(0);
    const header = buf.toString("latin1", 10, 10 + headerLen);
    expect(header.startsWith("{'descr': '<f4', 'fortran_order': False, 'shape': (2, 3), }")).toBe(true);
    expect(header.endsWith("\n")).toBe(true);
    expect(buf.length).toBe(10 + headerLen + 6 * 4);
  });

  it("decodes what it encodes", () => {
    const decoded = decodeNpy(encodeNpy(matrix));
    expect(decoded.rows).toBe(2);
    expect(decoded.cols).toBe(3);
    expect(Array.from(decoded.data)).toEqual([1, 2, 3, 0.5, -0.25, 0]);
  });

  it("handles an empty matrix", () => {
    const decoded = decodeNpy(encodeNpy({ rows: 0, cols: 0, data: new Float32Array(0) }));
    expect(decoded).toEqual({ rows: 0, cols: 0, data: new Float32Array(0) });
  });

  it("rejects data that disagrees with the shape on encode", () => {
    expect(() => encodeNpy({ rows: 2, cols: 2, data: new Float32Array(3) })).toThrow(NpyFormatError);
  });

  it("rejects a buffer without the magic prefix", () => {
    expect(() => decodeNpy(Buffer.from("not a numpy file at all"))).toThrow("bad magic");
  });

  it("rejects truncated data", () => {
    const buf = encodeNpy(matrix);
    expect(() => decodeNpy(buf.subarray(0, buf.length - 4))).toThrow(
      "Data size 20 bytes does not match shape (2, 3)",
    );
  });

  it("rejects other dtypes", () => {
    const buf = Buffer.from(encodeNpy(matrix));
    buf.write("<f8", buf.indexOf("<f4"), "latin1");
    expect(() => decodeNpy(buf)).toThrow("Unsupported dtype <f8");
  });
});
