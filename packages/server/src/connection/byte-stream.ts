/**
 * Duplex byte transport under a {@link Connection}.
 */
export interface ByteStream {
  /** One read. `null` means the peer closed its side. */
  read(): Promise<Uint8Array | null>

  /** Resolves once the bytes were handed to the transport. */
  write(bytes: Uint8Array): Promise<void>

  close(): void
}
