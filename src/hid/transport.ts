/**
 * Abstract HID transport used by every device handler.
 *
 * Calls are synchronous: writes block until queued, reads block up to a
 * timeout (or return immediately in non-blocking mode).
 */

import type { HidDeviceInfo } from "../core/types.js";

/** Size of one HID report, excluding the report ID. */
export const HID_REPORT_SIZE = 64;

export interface HidTransport {
  /**
   * Write one report. The first byte is the report ID.
   * @returns Number of bytes written
   */
  write(data: readonly number[] | Buffer): number;
  /**
   * Read one report, at most `maxLength` bytes.
   * Returns null when nothing arrived within `timeoutMs` (blocking mode)
   * or nothing is queued (non-blocking mode).
   */
  read(maxLength: number, timeoutMs: number): Buffer | null;
  setNonBlocking(nonBlocking: boolean): void;
  close(): void;
}

export interface HidBackend {
  enumerate(): HidDeviceInfo[];
  /** Open one HID interface by its path. Throws on failure. */
  open(path: string): HidTransport;
}
