import { EventEmitter } from 'events';
import { MAX_LINE_LEN, MEDIA_TOKEN, MUTE_TOKEN, VOLUME_PREFIX } from '../types.js';

export type SerialCommand =
  | { kind: 'volume'; value: number }
  | { kind: 'invalid-volume'; raw: string }
  | { kind: 'mute' }
  | { kind: 'media' }
  | { kind: 'button'; key: string };

const INTEGER = /^[+-]?\d+$/;

/**
 * Classifies one line from the pad:
 *
 *   VOLUME_<int>   absolute encoder position
 *   MUTE           mute toggle
 *   MEDIA          play/pause
 *   anything else  a button key, looked up in the config
 *
 * `VOLUME_` followed by anything other than an integer (nothing included)
 * is an invalid volume report, never a button key.
 */
export function classifyLine(line: string): SerialCommand {
  if (line.startsWith(VOLUME_PREFIX)) {
    const raw = line.slice(VOLUME_PREFIX.length);
    const value = INTEGER.test(raw) ? Number(raw) : NaN;
    return Number.isSafeInteger(value) ? { kind: 'volume', value } : { kind: 'invalid-volume', raw };
  }
  if (line === MUTE_TOKEN) return { kind: 'mute' };
  if (line === MEDIA_TOKEN) return { kind: 'media' };
  return { kind: 'button', key: line };
}

const NEWLINE = 0x0a;
const REPLACEMENT_CHAR = /\uFFFD/g;

/**
 * Streaming line splitter. Feed it chunks of serial data; it emits 'line'
 * events with each newline-terminated line, trimmed. Bytes that do not
 * decode as UTF-8 are dropped, blank lines are skipped and lines longer
 * than MAX_LINE_LEN bytes are discarded whole.
 */
export class LineParser extends EventEmitter {
  private lineBuf = Buffer.alloc(MAX_LINE_LEN);
  private linePos = 0;
  private overflow = false;
  private decoder = new TextDecoder('utf-8', { fatal: false });

  /** Feed a chunk of incoming serial data. */
  parse(data: Buffer): void {
    for (let i = 0; i < data.length; i++) {
      const byte = data[i];

      if (byte === NEWLINE) {
        if (!this.overflow) this.flush();
        this.linePos = 0;
        this.overflow = false;
        continue;
      }

      if (this.overflow) continue;

      if (this.linePos >= MAX_LINE_LEN) {
        console.warn(`Discarding serial line longer than ${MAX_LINE_LEN} bytes`);
        this.overflow = true;
        continue;
      }
      this.lineBuf[this.linePos++] = byte;
    }
  }

  reset(): void {
    this.linePos = 0;
    this.overflow = false;
  }

  private flush(): void {
    const line = this.decoder
      .decode(this.lineBuf.subarray(0, this.linePos))
      .replace(REPLACEMENT_CHAR, '')
      .trim();
    if (line) {
      this.emit('line', line);
    }
  }
}
