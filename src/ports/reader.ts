/**
 * Reader Port - half-duplex request/response link to the tag reader.
 */

export interface ReaderLink {
  /** Open the underlying device. Rejects with ReaderError on failure. */
  open(): Promise<void>;

  /**
   * Send one poll command and collect the reply until the frame
   * terminator or `timeoutMs`, whichever comes first.
   *
   * Resolves to the raw text received (possibly partial), or null when
   * nothing arrived in time. Rejects with ReaderError on I/O failure.
   */
  request(command: Buffer, timeoutMs: number): Promise<string | null>;

  /** Release the device. Safe to call when already closed. */
  close(): Promise<void>;

  isOpen(): boolean;
}
