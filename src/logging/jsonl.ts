import * as fs from 'fs';
import * as path from 'path';

export type RegistryEvent =
  | 'type_registered'
  | 'type_replaced'
  | 'tag_conflict'
  | 'context_cloned'
  | 'codec_failure';

// Structured registry log entry
export interface RegistryLogEntry {
  ts: string;
  event: RegistryEvent;
  context: string;
  tag?: string;
  type?: string;
  previousType?: string;
  parent?: string;
  direction?: 'serialize' | 'deserialize';
  error?: string;
}

export type LogSink = (entry: RegistryLogEntry) => void;

export const noopSink: LogSink = () => {};

export interface JsonlSink {
  write: LogSink;
  close(): Promise<void>;
}

/**
 * Appends one JSON object per line to `logPath`. A stream error disables
 * the sink instead of throwing into serialization calls.
 */
export function createJsonlSink(logPath: string): JsonlSink {
  let stream: fs.WriteStream | null = null;

  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    stream = fs.createWriteStream(logPath, { flags: 'a' });
    stream.on('error', (err) => {
      console.error(`[Log] Log stream error: ${err.message}`);
      stream = null;
    });
    console.log(`[Log] JSONL logging enabled: ${logPath}`);
  } catch (e) {
    console.error(`[Log] Failed to initialize log stream: ${e instanceof Error ? e.message : String(e)}`);
  }

  return {
    write(entry) {
      if (!stream) return;
      stream.write(JSON.stringify(entry) + '\n');
    },
    close() {
      const s = stream;
      stream = null;
      if (!s) return Promise.resolve();
      return new Promise<void>((resolve) => s.end(() => resolve()));
    }
  };
}
