/**
 * Minimal NumPy `.npy` (format 1.0) codec for 2-D little-endian float32
 * matrices, the only shape the embedding store persists.
 *
 * Layout: magic "\x93NUMPY", version bytes 1.0, uint16 LE header length,
 * ASCII dict header padded with spaces and terminated by "\n" so that the
 * data offset is a multiple of 64, then row-major float32 data.
 */

const MAGIC = Buffer.from([0x93, 0x4e, 0x55, 0x4d, 0x50, 0x59]); // \x93NUMPY
const PREAMBLE = MAGIC.length + 2 + 2;
const ALIGN = 64;

export interface Matrix {
  readonly rows: number;
  readonly cols: number;
  /** Row-major, length rows * cols. */
  readonly data: Float32Array;
}

export class NpyFormatError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "NpyFormatError";
  }
}

export function encodeNpy(m: Matrix): Buffer {
  if (m.data.length !== m.rows * m.cols) {
    throw new NpyFormatError(`Data length ${m.data.length} does not match shape (${m.rows}, ${m.cols})`);
  }
  let header = `{'descr': '<f4', 'fortran_order': False, 'shape': (${m.rows}, ${m.cols}), }`;
  const unpadded = PREAMBLE + header.length + 1;
  header += " ".repeat((ALIGN - (unpadded % ALIGN)) % ALIGN) + "\n";

  const out = Buffer.alloc(PREAMBLE + header.length + m.data.length * 4);
  MAGIC.copy(out, 0);
  out[6] = 1;
  out[7] = 0;
  out.writeUInt16LE(header.length, 8);
  out.write(header, PREAMBLE, "latin1");
  let offset = PREAMBLE + header.length;
  for (const v of m.data) {
    out.writeFloatLE(v, offset);
    offset += 4;
  }
  return out;
}

export function decodeNpy(buf: Buffer): Matrix {
  if (buf.length < PREAMBLE || !buf.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new NpyFormatError("Not an .npy file (bad magic)");
  }
  const major = buf[6];
  const headerLen = major === 1 ? buf.readUInt16LE(8) : major === 2 || major === 3 ? buf.readUInt32LE(8) : -1;
  if (headerLen < 0) throw new NpyFormatError(`Unsupported .npy version ${major}`);
  const headerStart = major === 1 ? PREAMBLE : PREAMBLE + 2;
  const dataStart = headerStart + headerLen;
  if (buf.length < dataStart) throw new NpyFormatError("Truncated .npy header");
  const header = buf.toString("latin1", headerStart, dataStart);

  const descr = /'descr':\s*'([^']+)'/.exec(header)?.[1];
  if (descr !== "<f4") throw new NpyFormatError(`Unsupported dtype ${descr ?? "(missing)"}`);
  if (/'fortran_order':\s*True/.test(header)) {
    throw new NpyFormatError("Fortran-ordered arrays are not supported");
  }
  const shapeRaw = /'shape':\s*\(([^)]*)\)/.exec(header)?.[1];
  if (shapeRaw === undefined) throw new NpyFormatError("Missing shape in .npy header");
  const dims = shapeRaw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(Number);
  if (dims.length !== 2 || dims.some((d) => !Number.isInteger(d) || d < 0)) {
    throw new NpyFormatError(`Expected a 2-D shape, got (${shapeRaw})`);
  }
  const [rows, cols] = dims;

  const expectedBytes = rows * cols * 4;
  if (buf.length - dataStart !== expectedBytes) {
    throw new NpyFormatError(
      `Data size ${buf.length - dataStart} bytes does not match shape (${rows}, ${cols})`,
    );
  }
  const data = new Float32Array(rows * cols);
  for (let i = 0; i < data.length; i++) data[i] = buf.readFloatLE(dataStart + i * 4);
  return { rows, cols, data };
}
