import type { PixelFormat, RawImage } from "../channels/types";

export function bytesPerPixel(format: PixelFormat): number {
  return format === "rgba" ? 4 : 3;
}

/**
 * Returns why `value` is not a well-formed raw image, or null when it is.
 */
export function findImageViolation(value: unknown): string | null {
  if (typeof value !== "object" || value === null) {
    return "expected an image object";
  }
  if (!("data" in value) || !(value.data instanceof Uint8Array)) {
    return "image data must be a Uint8Array";
  }
  const data = value.data;
  if (!("width" in value) || !("height" in value)) {
    return "image width and height are required";
  }
  const { width, height } = value;
  if (
    typeof width !== "number" ||
    typeof height !== "number" ||
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width <= 0 ||
    height <= 0
  ) {
    return "image width and height must be positive integers";
  }
  const format = "format" in value ? value.format : undefined;
  if (format !== "rgba" && format !== "rgb24") {
    return `unsupported pixel format ${String(format)}`;
  }
  const expected = width * height * bytesPerPixel(format);
  if (data.length !== expected) {
    return `expected ${expected} bytes of ${format} data for ${width}x${height}, got ${data.length}`;
  }
  return null;
}

export function isRawImage(value: unknown): value is RawImage {
  return findImageViolation(value) === null;
}

/**
 * RGBA view of an image, copying only when the source is rgb24.
 */
export function toRgba(image: RawImage): Uint8Array {
  if (image.format === "rgba") {
    return image.data;
  }
  const pixels = image.width * image.height;
  const out = new Uint8Array(pixels * 4);
  for (let i = 0; i < pixels; i++) {
    out[i * 4] = image.data[i * 3];
    out[i * 4 + 1] = image.data[i * 3 + 1];
    out[i * 4 + 2] = image.data[i * 3 + 2];
    out[i * 4 + 3] = 0xff;
  }
  return out;
}
