/**
 * Test Mocks
 *
 * In-process stand-ins for the object store, the raw extract reader and the
 * logger. Each matches its production interface exactly.
 *
 * TYPE SAFETY: Nuclear-level strictness. No `any`, no `@ts-ignore`.
 */

import type { SourceReader } from '../../acquisition/source-reader.js';
import type { LogLevel, LogMetadata, PipelineLogger } from '../../core/logging.js';
import { redact } from '../../cli/lib/logger.js';
import { TransportError } from '../../core/errors.js';
import type { BlobStore } from '../../storage/blob-store.js';

// ============================================================================
// Object Store
// ============================================================================

export interface StoreCall {
  readonly op: 'get' | 'put';
  readonly container: string;
  readonly key: string;
}

/**
 * BlobStore over a Map, recording every call
 */
export class MemoryBlobStore implements BlobStore {
  readonly objects = new Map<string, Uint8Array>();
  readonly calls: StoreCall[] = [];

  constructor(private readonly account = 'test-account') {}

  locate(container: string, key: string): string {
    return `${this.account}/${container}/${key}`;
  }

  /**
   * Seed objects without recording calls
   */
  seed(container: string, files: ReadonlyMap<string, string>): void {
    for (const [key, text] of files) {
      this.objects.set(this.locate(container, key), Buffer.from(text, 'utf-8'));
    }
  }

  async getText(container: string, key: string): Promise<string> {
    this.calls.push({ op: 'get', container, key });
    const location = this.locate(container, key);
    const body = this.objects.get(location);
    if (!body) {
      throw new TransportError(location, 'Object not found');
    }
    return Buffer.from(body).toString('utf-8');
  }

  async put(container: string, key: string, body: Uint8Array): Promise<string> {
    this.calls.push({ op: 'put', container, key });
    const location = this.locate(container, key);
    this.objects.set(location, body);
    return location;
  }

  /**
   * Stored object as text
   */
  text(container: string, key: string): string | undefined {
    const body = this.objects.get(this.locate(container, key));
    return body ? Buffer.from(body).toString('utf-8') : undefined;
  }
}

// ============================================================================
// Source Reader
// ============================================================================

/**
 * SourceReader over a Map of relative path → text
 */
export class MemorySourceReader implements SourceReader {
  readonly reads: string[] = [];

  constructor(private readonly files: ReadonlyMap<string, string>) {}

  locate(relativePath: string): string {
    return `memory://${relativePath}`;
  }

  async readText(relativePath: string): Promise<string> {
    this.reads.push(relativePath);
    const text = this.files.get(relativePath);
    if (text === undefined) {
      throw new TransportError(this.locate(relativePath), 'Cannot read file: not found');
    }
    return text;
  }
}

// ============================================================================
// Logger
// ============================================================================

export interface LoggedEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly metadata: Record<string, unknown>;
}

/**
 * Logger that keeps entries in memory, redacted like the real one
 */
export class RecordingLogger implements PipelineLogger {
  readonly entries: LoggedEntry[] = [];

  debug(message: string, metadata?: LogMetadata): void {
    this.record('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.record('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.record('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.record('error', message, metadata);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  private record(level: LogLevel, message: string, metadata: LogMetadata = {}): void {
    this.entries.push({ level, message, metadata: redact(metadata) });
  }
}
