/**
 * Transport: the line pipe between a client and the dispatcher.
 *
 * One request line in, one response line out. The transport knows nothing
 * about commands or wire values; it moves text and reports end of input.
 *
 * Implementations:
 *   - StdioTransport: readline over a readable stream, writes to a writable stream
 *   - MemoryTransport: in-process queue, for tests and embedding
 */

export interface Transport {
  /** Next request line, or null once the input has ended */
  receive(): Promise<string | null>
  /** Write one response line; the transport adds the newline */
  send(line: string): Promise<void>
  close(): Promise<void>
}
