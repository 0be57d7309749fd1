/**
 * Transport Sink
 * Destination for a finished export artifact.
 */

export interface TransportResult {
  success: boolean;
  error?: string;
}

export interface TransportSink {
  /**
   * Deliver the artifact bytes; failures are reported, not thrown
   */
  send(content: Buffer, destinationPath: string): Promise<TransportResult>;
}
