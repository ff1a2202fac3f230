/**
 * Fixed-width float encoding for persisted coefficient vectors.
 *
 * Values are kept as float64 in memory but rounded to the storage precision,
 * so a vector survives an encode/decode cycle bit-for-bit.
 */
import { getFloat16, setFloat16 } from "@petamoriken/float16";
import { precisionBytes, type Precision } from "./types.js";

export function writeFloat(view: DataView, offset: number, value: number, p: Precision): void {
  switch (p) {
    case "f16": setFloat16(view, offset, value, true); return;
    case "f32": view.setFloat32(offset, value, true); return;
    case "f64": view.setFloat64(offset, value, true); return;
  }
}

export function readFloat(view: DataView, offset: number, p: Precision): number {
  switch (p) {
    case "f16": return getFloat16(view, offset, true);
    case "f32": return view.getFloat32(offset, true);
    case "f64": return view.getFloat64(offset, true);
  }
}

/** Round a single value to what the given precision can represent. */
export function roundTo(value: number, p: Precision): number {
  switch (p) {
    case "f64": return value;
    case "f32": return Math.fround(value);
    case "f16": {
      const view = new DataView(new ArrayBuffer(2));
      setFloat16(view, 0, value, true);
      return getFloat16(view, 0, true);
    }
  }
}

/** Copy of `values` with every element rounded to `p`. */
export function castTo(values: ArrayLike<number>, p: Precision): Float64Array {
  const out = new Float64Array(values.length);
  for (let i = 0; i < values.length; i++) out[i] = roundTo(values[i], p);
  return out;
}

/** Little-endian bytes of `values` at precision `p`. */
export function toBytes(values: ArrayLike<number>, p: Precision): Uint8Array {
  const width = precisionBytes(p);
  const bytes = new Uint8Array(values.length * width);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < values.length; i++) writeFloat(view, i * width, values[i], p);
  return bytes;
}

export function fromBytes(bytes: Uint8Array, p: Precision): Float64Array {
  const width = precisionBytes(p);
  if (bytes.length % width !== 0) {
    throw new RangeError(`Byte length ${bytes.length} is not a multiple of ${width} (${p})`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out = new Float64Array(bytes.length / width);
  for (let i = 0; i < out.length; i++) out[i] = readFloat(view, i * width, p);
  return out;
}
