/**
 * Base64 Codec for cross-platform encoding/decoding
 * Works in both Node.js and browser environments
 */
export class Base64Codec {
  /**
   * Encode bytes to base64
   */
  static encodeBytes(bytes: Uint8Array): string {
    if (this.isNode()) {
      return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
    }
    // Browser
    let binary = "";
    for (let i = 0; i < bytes.length; i++) {
      binary += String.fromCharCode(bytes[i]);
    }
    return btoa(binary);
  }

  /**
   * Decode base64 to bytes
   */
  static decodeBytes(b64: string): Uint8Array {
    if (this.isNode()) {
      const buf = Buffer.from(b64, "base64");
      return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
    }
    // Browser
    const binary = atob(b64);
    const bytes = new Uint8Array(binary.length);
    for (let i = 0; i < binary.length; i++) {
      bytes[i] = binary.charCodeAt(i);
    }
    return bytes;
  }

  /**
   * Loose check that a string is standard (padded) base64.
   * Buffer.from silently skips invalid characters, so envelopes are checked first.
   */
  static isBase64(value: string): boolean {
    return value.length % 4 === 0 && /^[A-Za-z0-9+/]*={0,2}$/.test(value);
  }

  /**
   * Check if running in Node.js environment
   */
  private static isNode(): boolean {
    return typeof Buffer !== "undefined";
  }
}
