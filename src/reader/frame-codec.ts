/**
 * Frame codec for the A04-style FDX-B reader protocol.
 *
 * Request:  $A{addr}01{fmt}{BCC}#
 * Response: ${data}{BCC}#
 *
 * BCC is the XOR of every byte it covers, rendered as two uppercase hex
 * digits, and a reply must carry it in that form. The tag id is the first
 * run of 15 digits in the data, even when the run is part of a longer
 * number. Decoding never throws: anything malformed is "no tag this cycle".
 */

import { FrameCodecError } from '../core/errors.js';

export const FRAME_START = '$';
export const FRAME_END = '#';

/** Poll command code between address and format */
const POLL_COMMAND = '01';

/** FDX-B national id */
const TAG_PATTERN = /\d{15}/;

export type FrameDropReason = 'empty' | 'unframed' | 'too_short' | 'bcc_mismatch' | 'no_tag';

export type FrameDecodeResult =
  | { ok: true; tagId: string }
  | { ok: false; reason: FrameDropReason; expectedBcc?: string; receivedBcc?: string };

/**
 * XOR checksum over the bytes of `payload`.
 */
export function computeBcc(payload: string | Buffer): string {
  const bytes = typeof payload === 'string' ? Buffer.from(payload, 'latin1') : payload;
  let bcc = 0;
  for (const byte of bytes) {
    bcc ^= byte;
  }
  return bcc.toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Build the poll command for a reader address and output format.
 */
export function buildPollCommand(address: string, format: string): Buffer {
  if (!/^[0-9A-Fa-f]{2}$/.test(address)) {
    throw new FrameCodecError(`Reader address must be two hex digits, got "${address}"`);
  }
  if (!/^[0-9A-Za-z]$/.test(format)) {
    throw new FrameCodecError(`Reader format must be a single character, got "${format}"`);
  }
  const payload = `A${address}${POLL_COMMAND}${format}`;
  return Buffer.from(`${FRAME_START}${payload}${computeBcc(payload)}${FRAME_END}`, 'latin1');
}

/**
 * Wrap a data segment as a response frame with a valid BCC.
 * Used by the simulated reader and by tests.
 */
export function encodeResponseFrame(data: string): string {
  return `${FRAME_START}${data}${computeBcc(data)}${FRAME_END}`;
}

/**
 * Decode a response and say why it was dropped when it was.
 */
export function inspectFrame(raw: string | Buffer): FrameDecodeResult {
  const text = (typeof raw === 'string' ? raw : raw.toString('latin1')).trim();
  if (text.length === 0) {
    return { ok: false, reason: 'empty' };
  }
  if (!text.startsWith(FRAME_START) || !text.endsWith(FRAME_END)) {
    return { ok: false, reason: 'unframed' };
  }

  const payload = text.slice(FRAME_START.length, -FRAME_END.length);
  if (payload.length < 4) {
    return { ok: false, reason: 'too_short' };
  }

  const data = payload.slice(0, -2);
  const receivedBcc = payload.slice(-2);
  const expectedBcc = computeBcc(data);
  if (receivedBcc !== expectedBcc) {
    return { ok: false, reason: 'bcc_mismatch', expectedBcc, receivedBcc };
  }

  const match = TAG_PATTERN.exec(data);
  if (!match) {
    return { ok: false, reason: 'no_tag' };
  }
  return { ok: true, tagId: match[0] };
}

/**
 * Decode a response frame to its tag id, or null.
 */
export function decodeFrame(raw: string | Buffer): string | null {
  const result = inspectFrame(raw);
  return result.ok ? result.tagId : null;
}

/**
 * True when the text holds a complete frame (used to stop reading early).
 */
export function isFrameComplete(text: string): boolean {
  return text.trimEnd().endsWith(FRAME_END);
}
