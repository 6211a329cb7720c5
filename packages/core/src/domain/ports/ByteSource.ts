/** Metadata about the byte source (optional, for events and diagnostics). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading raw bytes from any origin (file, buffer, stream).
 *
 * Chunks may have any size; the Buffered Source copies them into its own
 * fixed-size buffer. Errors thrown while iterating are surfaced as `IOError`.
 */
export interface ByteSource {
  /** Yield byte chunks in order. Sources are read once per extraction session. */
  read(): AsyncIterable<Uint8Array>;
  metadata(): SourceMetadata;
}
