const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Decode bytes as UTF-8, throwing on malformed input. */
export function decodeUtf8(bytes: Uint8Array): string {
  return utf8.decode(bytes);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
