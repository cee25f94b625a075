/**
 * Utility functions for hash operations
 */

/**
 * Convert Uint8Array to hex string
 *
 * @param bytes Uint8Array of bytes
 * @returns Hexadecimal string (lowercase)
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}
